const NIXPKGS_PR_URL_REGEX =
  /^https?:\/\/github\.com\/NixOS\/nixpkgs\/pull\/(\d+)\/?(?:\?.*)?(?:#.*)?$/;

/** Web URL of a nixpkgs pull request */
export function pullRequestUrl(prNumber: number): string {
  return `https://github.com/NixOS/nixpkgs/pull/${prNumber}`;
}

/**
 * Extract the PR number from a nixpkgs pull request URL.
 *
 * Accepts URLs like:
 *   https://github.com/NixOS/nixpkgs/pull/123
 *   https://github.com/NixOS/nixpkgs/pull/123/
 *   https://github.com/NixOS/nixpkgs/pull/123#issuecomment-1
 *
 * Returns null for anything else, including PRs on other repositories.
 */
export function parsePRUrl(input: string): number | null {
  try {
    new URL(input);
  } catch {
    return null;
  }

  const match = input.match(NIXPKGS_PR_URL_REGEX);
  if (!match) return null;

  return parseInt(match[1], 10);
}
