import type { EventEmitter } from 'node:events';
import { EXIT_FAILURE, InterruptedError } from './errors.js';
import { printWarning } from './output.js';

const EXIT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** Aborted with an InterruptedError once the current run receives an exit signal */
let controller: AbortController | null = null;

/**
 * Keep exit signals from killing the process while a run is in progress.
 *
 * The first signal aborts `exitSignal()` so running children are stopped and
 * `finally` blocks release worktrees and the build environment. A second
 * signal exits at once. Returns a function that removes the handlers.
 */
export function trapExitSignals(source: Pick<EventEmitter, 'on' | 'off'> = process): () => void {
  const own = new AbortController();
  controller = own;

  const handler = (signal: NodeJS.Signals): void => {
    if (own.signal.aborted) {
      process.exit(EXIT_FAILURE);
    }
    printWarning(`received ${signal}, cleaning up (send it again to quit immediately)`);
    own.abort(new InterruptedError(signal));
  };

  for (const signal of EXIT_SIGNALS) {
    source.on(signal, handler);
  }

  return () => {
    for (const signal of EXIT_SIGNALS) {
      source.off(signal, handler);
    }
    if (controller === own) controller = null;
  };
}

/** Signal of the current run, if exit signals are trapped */
export function exitSignal(): AbortSignal | undefined {
  return controller?.signal;
}

/** Throw the InterruptedError of the current run, if it received an exit signal */
export function throwIfInterrupted(): void {
  const reason: unknown = controller?.signal.reason;
  if (reason instanceof InterruptedError) {
    throw reason;
  }
}
