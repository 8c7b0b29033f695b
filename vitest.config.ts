import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // buildenv tests call process.chdir, which worker threads do not allow
    pool: 'forks',
  },
});
