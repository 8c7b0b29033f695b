import { EXIT_SUCCESS } from '../errors.js';
import { verifyCommit } from '../git.js';
import { validateAttrPath } from '../packages.js';
import { Review } from '../review.js';
import { Worktree } from '../worktree.js';

export interface RevCommandOptions {
  commit: string;
  branch: string;
  buildArgs: string;
  package: string[];
}

/**
 * Review one commit from the local repository against a nixpkgs branch.
 *
 * The ref must verify before anything else happens; a failure there is fatal.
 */
export async function revCommand(options: RevCommandOptions): Promise<number> {
  const onlyPackages = new Set(options.package);
  onlyPackages.forEach(validateAttrPath);

  const commit = await verifyCommit(options.commit);
  const worktree = await Worktree.create(`rev-${commit}`);

  try {
    const review = new Review({
      worktreeDir: worktree.worktreeDir,
      buildArgs: options.buildArgs,
      evalSource: 'local',
      onlyPackages,
      checkout: 'merge',
    });
    await review.reviewCommit(options.branch, commit);
  } finally {
    await worktree.release();
  }

  return EXIT_SUCCESS;
}
