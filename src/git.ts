import { capture } from './process.js';

/** Upstream repository every PR ref and base branch is fetched from */
export const NIXPKGS_REMOTE = 'https://github.com/NixOS/nixpkgs';

/** Namespace for refs fetched by a review, so they never clobber the user's */
const FETCH_REF_PREFIX = 'refs/nix-review';

/**
 * Validate a user- or API-supplied value before it becomes a git argument.
 * Rejects a leading dash (git flag injection), path traversal (..), and null bytes.
 */
export function validateGitArg(value: string, label: string): void {
  if (!value) {
    throw new Error(`${label} is empty`);
  }
  if (value.startsWith('-')) {
    throw new Error(`${label} '${value}' starts with a dash`);
  }
  if (value.includes('..')) {
    throw new Error(`${label} '${value}' contains path traversal sequence`);
  }
  if (value.includes('\0')) {
    throw new Error(`${label} contains null byte`);
  }
}

/**
 * Resolve a commit, tag, branch or other ref in the local repository to a
 * commit hash. Fails with CommandFailedError when the ref does not verify.
 */
export async function verifyCommit(ref: string): Promise<string> {
  validateGitArg(ref, 'Commit');
  const stdout = await capture('git', ['rev-parse', '--verify', ref]);
  return stdout.trim();
}

/**
 * Fetch refs from nixpkgs into private refs and return their commit hashes,
 * in the order given.
 */
export async function fetchRefs(...refs: string[]): Promise<string[]> {
  for (const ref of refs) {
    validateGitArg(ref, 'Ref');
  }

  const refspecs = refs.map((ref, i) => `${ref}:${FETCH_REF_PREFIX}/${i}`);
  await capture('git', ['fetch', '--force', NIXPKGS_REMOTE, ...refspecs]);

  const commits: string[] = [];
  for (let i = 0; i < refs.length; i++) {
    const stdout = await capture('git', ['rev-parse', '--verify', `${FETCH_REF_PREFIX}/${i}`]);
    commits.push(stdout.trim());
  }
  return commits;
}

export async function mergeBase(a: string, b: string): Promise<string> {
  const stdout = await capture('git', ['merge-base', a, b]);
  return stdout.trim();
}

/** Check out `commit` (detached) into the existing, empty directory `dir` */
export async function worktreeAdd(dir: string, commit: string): Promise<void> {
  await capture('git', ['worktree', 'add', '--detach', dir, commit]);
}

/** Merge `commit` into the worktree at `dir` without committing */
export async function merge(dir: string, commit: string): Promise<void> {
  await capture('git', ['-C', dir, 'merge', '--no-commit', '--no-ff', commit]);
}

export async function checkout(dir: string, commit: string): Promise<void> {
  await capture('git', ['-C', dir, 'checkout', commit]);
}

/** Drop administrative data for worktrees whose directory is gone */
export async function worktreePrune(): Promise<void> {
  await capture('git', ['worktree', 'prune']);
}
