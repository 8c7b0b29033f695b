import { execFile as execFileCb, spawn, type ChildProcess } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandFailedError, InterruptedError } from './errors.js';
import { exitSignal } from './exit-signal.js';
import { printCommand } from './output.js';

const execFile = promisify(execFileCb);

/** Max buffer for captured output: `nix-env --json` over all of nixpkgs is large */
const MAX_BUFFER = 512 * 1024 * 1024;

/**
 * Pass an exit signal the run receives on to `child` while it runs.
 * Returns a function that stops forwarding.
 */
function forwardExitSignal(child: ChildProcess): () => void {
  const signal = exitSignal();
  if (signal === undefined) return () => undefined;

  const forward = (): void => {
    const reason: unknown = signal.reason;
    if (reason instanceof InterruptedError) child.kill(reason.signal);
  };
  signal.addEventListener('abort', forward, { once: true });
  return () => signal.removeEventListener('abort', forward);
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run a command to completion and return its stdout.
 *
 * A non-zero exit, or death by a signal, becomes a CommandFailedError carrying
 * stderr. Failures to start the process at all (ENOENT and friends) are
 * rethrown untouched.
 */
export async function capture(
  command: string,
  args: readonly string[],
  options: RunOptions = {},
): Promise<string> {
  printCommand(command, args);

  const p = execFile(command, [...args], {
    cwd: options.cwd,
    env: options.env,
    encoding: 'utf-8',
    maxBuffer: MAX_BUFFER,
  });

  // Nothing we run reads stdin; leaving it open can hang git prompts
  p.child.stdin?.end();
  const stopForwarding = forwardExitSignal(p.child);

  try {
    const { stdout } = await p;
    return stdout;
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error) {
      const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
      if (typeof error.code === 'number') {
        throw new CommandFailedError(command, args, error.code, stderr);
      }
      if ('signal' in error && typeof error.signal === 'string') {
        throw new CommandFailedError(command, args, 1, stderr);
      }
    }
    throw error;
  } finally {
    stopForwarding();
  }
}

/**
 * Spawn a command attached to the terminal and resolve with its exit status.
 */
export function runInteractive(
  command: string,
  args: readonly string[],
  options: RunOptions = {},
): Promise<number> {
  printCommand(command, args);

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: 'inherit',
    });
    const stopForwarding = forwardExitSignal(child);
    child.on('error', (error) => {
      stopForwarding();
      reject(error);
    });
    child.on('close', (code) => {
      stopForwarding();
      resolve(code ?? 1);
    });
  });
}

/**
 * Like runInteractive, but a non-zero exit status is a CommandFailedError.
 * Used for builds, whose progress the user should see as it happens.
 */
export async function run(
  command: string,
  args: readonly string[],
  options: RunOptions = {},
): Promise<void> {
  const exitCode = await runInteractive(command, args, options);
  if (exitCode !== 0) {
    throw new CommandFailedError(command, args, exitCode);
  }
}
