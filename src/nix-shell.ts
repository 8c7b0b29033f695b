import { printWarning } from './output.js';
import { runInteractive } from './process.js';

/**
 * Open an interactive `nix-shell` with the given attributes available.
 *
 * `<nixpkgs>` resolves through NIX_PATH in `env` (the process environment by
 * default). The shell's own exit status is the user's business and is ignored.
 */
export async function nixShell(
  attrs: ReadonlySet<string>,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  if (attrs.size === 0) {
    printWarning('nothing to build, not starting a shell');
    return;
  }
  await runInteractive('nix-shell', ['-p', ...attrs], { env });
}
