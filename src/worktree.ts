import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { homedir } from 'node:os';
import * as path from 'node:path';
import { worktreePrune } from './git.js';

/**
 * Base directory for review worktrees: `$XDG_CACHE_HOME/nix-review`,
 * falling back to `~/.cache/nix-review`.
 */
export function getCacheDir(): string {
  const cacheHome = process.env['XDG_CACHE_HOME'] || path.join(homedir(), '.cache');
  return path.join(cacheHome, 'nix-review');
}

/** The NIX_PATH entry that makes `<nixpkgs>` resolve to `dir` */
export function nixpkgsPath(dir: string): string {
  return `nixpkgs=${dir}`;
}

/**
 * An isolated checkout directory for reviewing one change.
 *
 * Each worktree gets a fresh directory (`<name>-XXXXXX`) so reruns never collide.
 * The directory is empty until the review checks a commit out into it.
 * Callers own the lifetime and must call `release()` on every exit path.
 */
export class Worktree {
  private released = false;

  private constructor(
    readonly name: string,
    readonly worktreeDir: string,
  ) {}

  static async create(name: string): Promise<Worktree> {
    const cacheDir = getCacheDir();
    await mkdir(cacheDir, { recursive: true, mode: 0o700 });
    const safeName = name.replace(/[^a-zA-Z0-9._-]/g, '_');
    const dir = await mkdtemp(path.join(cacheDir, `${safeName}-`));
    return new Worktree(name, dir);
  }

  nixpkgsPath(): string {
    return nixpkgsPath(this.worktreeDir);
  }

  /** Remove the checkout and prune git's record of it. Safe to call twice. */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.worktreeDir, { recursive: true, force: true });
    await worktreePrune();
  }
}
