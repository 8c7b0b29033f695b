import pc from 'picocolors';
import type { PrereqFailure } from './types.js';

/**
 * Echo an external command before it runs, dimmed, shell-style.
 */
export function printCommand(command: string, args: readonly string[]): void {
  console.log(pc.dim(`$ ${[command, ...args].join(' ')}`));
}

/**
 * Print prerequisite failures as red errors with actionable help.
 */
export function printErrors(failures: PrereqFailure[]): void {
  for (const f of failures) {
    console.error(pc.red(`\u2716 ${f.message}`));
    console.error(pc.dim(`  ${f.help}`));
  }
}

/** Print a fatal error line */
export function printError(message: string): void {
  console.error(pc.red(`\u2716 ${message}`));
}

export function printWarning(message: string): void {
  console.error(pc.yellow(`\u26A0 ${message}`));
}

/**
 * Print the URL of a PR whose shell is about to open.
 * Plain text so it stays clickable in every terminal.
 */
export function printPRUrl(url: string): void {
  console.log(url);
}

/**
 * Print what a failed command wrote to stderr, indented under the error line.
 * Prints nothing for empty output.
 */
export function printFailureDetail(stderr: string): void {
  const text = stderr.trimEnd();
  if (!text) return;
  for (const line of text.split('\n')) {
    console.error(pc.dim(`  ${line}`));
  }
}

/** Report a PR that did not build, with the failing command's stderr. Goes to stderr. */
export function printBuildFailure(url: string, stderr = ''): void {
  console.error(pc.red(`${url} failed to build`));
  printFailureDetail(stderr);
}

/**
 * List the attributes that were built for a change, one per line.
 */
export function printBuiltPackages(attrs: ReadonlySet<string>): void {
  if (attrs.size === 0) {
    console.log(pc.dim('No packages built'));
    return;
  }
  console.log(pc.bold(`${attrs.size} package${attrs.size === 1 ? '' : 's'} built:`));
  for (const attr of [...attrs].sort()) {
    console.log(`  ${pc.green(attr)}`);
  }
}

/**
 * Print the outcome of a PR batch: "N built · M failed (duration)".
 * The failed part is omitted when nothing failed.
 */
export function printBatchSummary(built: number, failed: number, durationMs: number): void {
  const parts = [pc.green(`${built} built`)];
  if (failed > 0) {
    parts.push(pc.red(`${failed} failed`));
  }
  console.log(`${parts.join(pc.dim(' \u00B7 '))} ${pc.dim(`(${formatDuration(durationMs)})`)}`);
}

/**
 * Format milliseconds as human-readable duration.
 * Under 60s: "1.2s", over 60s: "1m 12s"
 */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
