/** How a PR's worktree is prepared before building */
export type CheckoutOption = 'merge' | 'commit';

/** Where the list of packages a change affects comes from */
export type EvalSource = 'ofborg' | 'local';

export const CHECKOUT_OPTIONS: readonly CheckoutOption[] = ['merge', 'commit'];

export const EVAL_SOURCES: readonly EvalSource[] = ['ofborg', 'local'];

/** Configuration for reviewing one change inside one worktree */
export interface ReviewOptions {
  worktreeDir: string;
  /** Raw extra arguments for nix-build, split shell-style before use */
  buildArgs: string;
  apiToken?: string;
  evalSource: EvalSource;
  /** When non-empty, exactly these attributes are built and evaluation is skipped */
  onlyPackages: ReadonlySet<string>;
  checkout: CheckoutOption;
}

/** The parts of a nixpkgs pull request the review needs */
export interface PullRequest {
  number: number;
  baseRef: string;
  headSha: string;
}

/** A package from `nix-env -qaP --json --out-path` */
export interface Package {
  attr: string;
  name: string;
  /** Output paths keyed by output name */
  outputs: Record<string, string>;
}

/** A prerequisite check failure with actionable help */
export interface PrereqFailure {
  name: string;
  message: string;
  help: string;
}
