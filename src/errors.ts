/** Exit code when every requested change was reviewed */
export const EXIT_SUCCESS = 0;

/**
 * Exit code for everything else: a change that failed to build, a malformed
 * PR number, a missing prerequisite, or a fatal error.
 */
export const EXIT_FAILURE = 1;

/**
 * An external command ran and exited non-zero.
 *
 * Within a PR batch this is the build-failure signal: the PR is reported
 * and skipped while its siblings continue. Anywhere else it is fatal.
 */
export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly exitCode: number,
    readonly stderr: string = '',
  ) {
    super(`${[command, ...args].join(' ')} exited with status ${exitCode}`);
    this.name = 'CommandFailedError';
  }
}

/** Invalid command-line input, such as a PR token that is not a number or range */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** The working directory is not inside a nixpkgs checkout */
export class NixpkgsRootError extends Error {
  constructor(start: string) {
    super(`${start} is not inside a nixpkgs checkout (no .version and nixos/ found in any parent)`);
    this.name = 'NixpkgsRootError';
  }
}

/** The run received SIGINT, SIGTERM or SIGHUP and is unwinding */
export class InterruptedError extends Error {
  constructor(readonly signal: NodeJS.Signals) {
    super(`interrupted by ${signal}`);
    this.name = 'InterruptedError';
  }
}

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token/key patterns with [REDACTED].
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}
