import { CommandFailedError, EXIT_FAILURE, EXIT_SUCCESS, sanitizeError, scrubSecrets } from '../errors.js';
import { throwIfInterrupted } from '../exit-signal.js';
import { nixShell } from '../nix-shell.js';
import { printBatchSummary, printBuildFailure, printPRUrl, printWarning } from '../output.js';
import { validateAttrPath } from '../packages.js';
import { parsePRNumbers } from '../pr-numbers.js';
import { Review } from '../review.js';
import type { CheckoutOption, EvalSource } from '../types.js';
import { pullRequestUrl } from '../url-parser.js';
import { Worktree } from '../worktree.js';

export interface PrCommandOptions {
  /** Raw operands: numbers, `a-b` ranges or PR URLs */
  numbers: string[];
  token?: string;
  eval: EvalSource;
  checkout: CheckoutOption;
  buildArgs: string;
  package: string[];
}

/** A PR that built, with the worktree its shell will run against */
interface BuiltPR {
  pr: number;
  worktree: Worktree;
  attrs: Set<string>;
}

/**
 * Release worktrees newest first. A failed release is reported and the
 * remaining worktrees are still released.
 */
export async function releaseAll(worktrees: readonly Worktree[]): Promise<void> {
  for (const worktree of [...worktrees].reverse()) {
    try {
      await worktree.release();
    } catch (error: unknown) {
      printWarning(`could not remove ${worktree.worktreeDir}: ${sanitizeError(error)}`);
    }
  }
}

/**
 * Review a batch of nixpkgs pull requests.
 *
 * Every PR is built in its own worktree, in the order given. A PR whose build
 * fails is reported and skipped; any other error, or an exit signal, aborts
 * the batch. Once all builds are done, a nix-shell opens for each PR that
 * built, one after the other. Worktrees, including those of failed PRs, live until the last shell
 * exits and are then released together.
 *
 * @returns EXIT_SUCCESS if every PR built, EXIT_FAILURE otherwise
 */
export async function prCommand(options: PrCommandOptions): Promise<number> {
  const prs = parsePRNumbers(options.numbers);
  const onlyPackages = new Set(options.package);
  onlyPackages.forEach(validateAttrPath);

  const worktrees: Worktree[] = [];
  const built: BuiltPR[] = [];
  const start = performance.now();

  try {
    for (const pr of prs) {
      throwIfInterrupted();
      const worktree = await Worktree.create(`pr-${pr}`);
      worktrees.push(worktree);

      const review = new Review({
        worktreeDir: worktree.worktreeDir,
        buildArgs: options.buildArgs,
        apiToken: options.token,
        evalSource: options.eval,
        onlyPackages,
        checkout: options.checkout,
      });

      try {
        built.push({ pr, worktree, attrs: await review.buildPr(pr) });
      } catch (error: unknown) {
        if (!(error instanceof CommandFailedError)) throw error;
        // A build killed by Ctrl-C is not a build failure
        throwIfInterrupted();
        printBuildFailure(pullRequestUrl(pr), scrubSecrets(error.stderr));
      }
    }

    printBatchSummary(built.length, prs.length - built.length, performance.now() - start);

    // NIX_PATH is the only channel to nix-shell; shells must run one at a time
    for (const { pr, worktree, attrs } of built) {
      throwIfInterrupted();
      printPRUrl(pullRequestUrl(pr));
      process.env['NIX_PATH'] = worktree.nixpkgsPath();
      await nixShell(attrs);
    }
  } finally {
    await releaseAll(worktrees);
  }

  return built.length === prs.length ? EXIT_SUCCESS : EXIT_FAILURE;
}
