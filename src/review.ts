import { writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import * as git from './git.js';
import { createOctokit, fetchOfborgEvalGist, fetchPullRequest } from './github.js';
import { nixShell } from './nix-shell.js';
import { throwIfInterrupted } from './exit-signal.js';
import { printBuiltPackages, printWarning } from './output.js';
import {
  currentSystem,
  differences,
  filterPackages,
  listPackages,
  nixAttrPath,
  parseAttrPath,
  parseOfborgGist,
} from './packages.js';
import { run } from './process.js';
import { splitShellWords } from './shell-words.js';
import type { ReviewOptions } from './types.js';
import { nixpkgsPath } from './worktree.js';

/**
 * Build a Nix expression that evaluates to a list of the given attributes.
 * Names that need it are quoted: `pkgs.nodePackages."@angular/cli"`.
 */
export function buildExpression(attrs: ReadonlySet<string>): string {
  const lines = ['with import <nixpkgs> {};', '['];
  for (const attr of [...attrs].sort()) {
    lines.push(`  pkgs.${nixAttrPath(attr)}`);
  }
  lines.push(']', '');
  return lines.join('\n');
}

/**
 * Evaluates and builds one change inside one worktree.
 *
 * Every git, nix-env and nix-build call goes through the process runner, so a
 * failing step surfaces as CommandFailedError. GitHub API errors surface as
 * Octokit's own errors.
 */
export class Review {
  constructor(private readonly options: ReviewOptions) {}

  private get env(): NodeJS.ProcessEnv {
    return { ...process.env, NIX_PATH: nixpkgsPath(this.options.worktreeDir) };
  }

  /**
   * Check out, evaluate and build a nixpkgs pull request.
   * Returns the attributes that were built.
   */
  async buildPr(prNumber: number): Promise<Set<string>> {
    const octokit = createOctokit(this.options.apiToken);
    const pr = await fetchPullRequest(octokit, prNumber);

    let packages: Set<string> | null = null;
    if (this.options.onlyPackages.size === 0 && this.options.evalSource === 'ofborg') {
      const gist = await fetchOfborgEvalGist(octokit, pr.headSha);
      if (gist === null) {
        printWarning(`no ofborg evaluation for #${prNumber} yet, evaluating locally`);
      } else {
        packages = parseOfborgGist(gist, await currentSystem());
      }
    }

    const [baseRev, headRev] = await git.fetchRefs(pr.baseRef, `pull/${pr.number}/head`);
    const startRev =
      this.options.checkout === 'merge' ? baseRev : await git.mergeBase(baseRev, headRev);

    if (packages === null) {
      return this.buildCommit(startRev, headRev);
    }

    await git.worktreeAdd(this.options.worktreeDir, startRev);
    await this.applyChange(headRev);
    return this.build(filterPackages(packages, this.options.onlyPackages));
  }

  /**
   * Build `commit` from the local repository against `branch` from nixpkgs,
   * then open a shell with the result.
   */
  async reviewCommit(branch: string, commit: string): Promise<void> {
    const [branchRev] = await git.fetchRefs(branch);
    const attrs = await this.buildCommit(branchRev, commit);
    await nixShell(attrs, this.env);
  }

  /**
   * Check out `baseRev`, apply `reviewedRev` on top, and build what changed.
   * Packages are evaluated locally before and after, unless `-p` fixed them.
   */
  async buildCommit(baseRev: string, reviewedRev: string): Promise<Set<string>> {
    const { worktreeDir, onlyPackages } = this.options;
    throwIfInterrupted();
    await git.worktreeAdd(worktreeDir, baseRev);

    if (onlyPackages.size > 0) {
      await this.applyChange(reviewedRev);
      return this.build(onlyPackages);
    }

    const before = await listPackages(worktreeDir);
    await this.applyChange(reviewedRev);
    const after = await listPackages(worktreeDir);
    return this.build(differences(before, after));
  }

  private async applyChange(rev: string): Promise<void> {
    if (this.options.checkout === 'merge') {
      await git.merge(this.options.worktreeDir, rev);
    } else {
      await git.checkout(this.options.worktreeDir, rev);
    }
  }

  /**
   * nix-build every attribute, keeping going past individual failures.
   * Any failure still fails the change as a whole. Attribute paths that do
   * not parse are skipped with a warning.
   */
  async build(changed: ReadonlySet<string>): Promise<Set<string>> {
    const attrs = new Set<string>();
    for (const attr of changed) {
      if (parseAttrPath(attr) === null) {
        printWarning(`skipping malformed attribute path '${attr}'`);
      } else {
        attrs.add(attr);
      }
    }

    if (attrs.size === 0) {
      printWarning('no packages changed');
      return new Set();
    }

    throwIfInterrupted();
    const buildFile = path.join(this.options.worktreeDir, 'build.nix');
    await writeFile(buildFile, buildExpression(attrs));

    await run(
      'nix-build',
      [buildFile, '--no-out-link', '--keep-going', ...splitShellWords(this.options.buildArgs)],
      { env: this.env },
    );

    printBuiltPackages(attrs);
    return attrs;
  }
}
