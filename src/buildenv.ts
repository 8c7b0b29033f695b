import { existsSync, statSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { NixpkgsRootError } from './errors.js';

/** nixpkgs config used for every evaluation and build during a review */
export const NIXPKGS_CONFIG = '{ allowUnfree = true; }\n';

function isNixpkgsRoot(dir: string): boolean {
  const nixosDir = path.join(dir, 'nixos');
  return existsSync(path.join(dir, '.version')) && existsSync(nixosDir) && statSync(nixosDir).isDirectory();
}

/**
 * Walk up from `start` to the first directory that looks like a nixpkgs
 * checkout (has `.version` and `nixos/`). Returns null at the filesystem root.
 */
export function findNixpkgsRoot(start: string = process.cwd()): string | null {
  let dir = path.resolve(start);
  for (;;) {
    if (isNixpkgsRoot(dir)) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Process-wide environment for one invocation.
 *
 * `enter()` moves into the nixpkgs root, snapshots `process.env`, and points
 * NIXPKGS_CONFIG at a private config file. `exit()` undoes all of it, including
 * any NIX_PATH the PR batch wrote while handing off to shells.
 */
export class Buildenv {
  private savedCwd: string | null = null;
  private savedEnv: NodeJS.ProcessEnv | null = null;
  private configDir: string | null = null;

  async enter(): Promise<void> {
    const cwd = process.cwd();
    const root = findNixpkgsRoot(cwd);
    if (root === null) {
      throw new NixpkgsRootError(cwd);
    }

    this.savedCwd = cwd;
    this.savedEnv = { ...process.env };
    process.chdir(root);

    this.configDir = await mkdtemp(path.join(tmpdir(), 'nix-review-'));
    const configFile = path.join(this.configDir, 'config.nix');
    await writeFile(configFile, NIXPKGS_CONFIG);
    process.env['NIXPKGS_CONFIG'] = configFile;
  }

  async exit(): Promise<void> {
    if (this.savedCwd !== null) {
      process.chdir(this.savedCwd);
      this.savedCwd = null;
    }

    if (this.savedEnv !== null) {
      const saved = this.savedEnv;
      for (const key of Object.keys(process.env)) {
        if (!(key in saved)) delete process.env[key];
      }
      Object.assign(process.env, saved);
      this.savedEnv = null;
    }

    if (this.configDir !== null) {
      await rm(this.configDir, { recursive: true, force: true });
      this.configDir = null;
    }
  }
}

/**
 * Run `fn` inside a Buildenv. The environment is torn down on every path out,
 * including when `fn` throws.
 */
export async function withBuildenv<T>(fn: () => Promise<T>): Promise<T> {
  const env = new Buildenv();
  try {
    await env.enter();
    return await fn();
  } finally {
    await env.exit();
  }
}
