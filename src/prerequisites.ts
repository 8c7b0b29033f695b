import { execFileSync } from 'node:child_process';
import type { PrereqFailure } from './types.js';

/** External tools a review shells out to, with where to get them */
const REQUIRED_TOOLS: ReadonlyArray<{ name: string; help: string }> = [
  { name: 'git', help: 'Install it: https://git-scm.com/downloads' },
  { name: 'nix-build', help: 'Install Nix: https://nixos.org/download' },
  { name: 'nix-env', help: 'Install Nix: https://nixos.org/download' },
  { name: 'nix-instantiate', help: 'Install Nix: https://nixos.org/download' },
  { name: 'nix-shell', help: 'Install Nix: https://nixos.org/download' },
];

/**
 * Check all prerequisites and collect failures.
 *
 * Every tool is checked (not fail-fast) so the user sees the whole list at once.
 * Returns an empty array when all checks pass (silent on success).
 */
export function checkPrerequisites(): PrereqFailure[] {
  const failures: PrereqFailure[] = [];
  const whichCmd = process.platform === 'win32' ? 'where' : 'which';

  for (const tool of REQUIRED_TOOLS) {
    try {
      execFileSync(whichCmd, [tool.name], { stdio: 'pipe' });
    } catch {
      failures.push({
        name: tool.name,
        message: `${tool.name} not found`,
        help: tool.help,
      });
    }
  }

  return failures;
}
