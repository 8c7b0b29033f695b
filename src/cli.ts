import { Command, CommanderError, Option } from 'commander';
import { withBuildenv } from './buildenv.js';
import { prCommand, type PrCommandOptions } from './commands/pr.js';
import { revCommand, type RevCommandOptions } from './commands/rev.js';
import { CommandFailedError, EXIT_FAILURE, sanitizeError, scrubSecrets } from './errors.js';
import { trapExitSignals } from './exit-signal.js';
import { printError, printErrors, printFailureDetail } from './output.js';
import { checkPrerequisites } from './prerequisites.js';
import { CHECKOUT_OPTIONS, EVAL_SOURCES, type CheckoutOption, type EvalSource } from './types.js';

/** Options each subcommand's handler takes */
interface SubcommandOptions {
  pr: PrCommandOptions;
  rev: RevCommandOptions;
}

export type Subcommand = keyof SubcommandOptions;

/** The parsed command line: which subcommand runs, and with what */
export type Invocation<S extends Subcommand = Subcommand> = {
  [K in S]: { subcommand: K; options: SubcommandOptions[K] };
}[S];

type Handler<S extends Subcommand> = (options: SubcommandOptions[S]) => Promise<number>;

const HANDLERS: { [S in Subcommand]: Handler<S> } = {
  pr: prCommand,
  rev: revCommand,
};

/** A flag both subcommands accept, declared once */
interface CommonFlag {
  flags: string;
  description: string;
  defaultValue: string | string[];
  /** Folds repeated occurrences; without it the last occurrence wins */
  collect?: (value: string, previous: string[]) => string[];
}

const COMMON_FLAGS: readonly CommonFlag[] = [
  {
    flags: '--build-args <args>',
    description: 'arguments passed to nix-build',
    defaultValue: '',
  },
  {
    flags: '-p, --package <name>',
    description: 'package to build (can be passed multiple times)',
    defaultValue: [],
    collect: (value, previous) => [...previous, value],
  },
];

function addCommonFlags(command: Command): Command {
  for (const flag of COMMON_FLAGS) {
    const option = new Option(flag.flags, flag.description).default(flag.defaultValue);
    if (flag.collect) {
      option.argParser(flag.collect);
    }
    command.addOption(option);
  }
  return command;
}

interface PrFlags {
  token?: string;
  eval: EvalSource;
  checkout: CheckoutOption;
  buildArgs: string;
  package: string[];
}

interface RevFlags {
  branch: string;
  buildArgs: string;
  package: string[];
}

/**
 * Build the commander program. Each subcommand's action only records what was
 * asked for; `dispatch` runs it after parsing.
 */
function createProgram(select: (invocation: Invocation) => void): Command {
  const program = new Command()
    .name('nix-review')
    .description('Build nixpkgs pull requests and commits in isolated worktrees')
    .version('0.1.0')
    .exitOverride()
    .showHelpAfterError();

  const pr = program
    .command('pr')
    .description('review pull requests on nixpkgs')
    .argument('<number...>', 'one or more nixpkgs pull request numbers (ranges are also supported)')
    .addOption(
      new Option('--token <token>', 'GitHub access token (optional, raises the API rate limit)')
        .env('GITHUB_OAUTH_TOKEN'),
    )
    .addOption(
      new Option('--eval <source>', "whether to use ofborg's evaluation result")
        .choices(EVAL_SOURCES)
        .default('ofborg'),
    )
    .addOption(
      new Option(
        '-c, --checkout <strategy>',
        'what to check out when building: `merge` merges the pull request into the target branch, ' +
          '`commit` checks out the pull request as the author committed it',
      )
        .choices(CHECKOUT_OPTIONS)
        .default('merge'),
    )
    .action((numbers: string[], flags: PrFlags) => {
      select({ subcommand: 'pr', options: { numbers, ...flags } });
    });

  const rev = program
    .command('rev')
    .description('review a change in the local nixpkgs repository')
    .argument('<commit>', 'commit/tag/ref/branch in your local git repository')
    .option('-b, --branch <branch>', 'branch to compare against', 'master')
    .action((commit: string, flags: RevFlags) => {
      select({ subcommand: 'rev', options: { commit, ...flags } });
    });

  addCommonFlags(pr);
  addCommonFlags(rev);

  return program;
}

/**
 * Parse a full argv (`node`, script, then arguments).
 * Throws CommanderError for help, version, and every usage error, including
 * a missing subcommand.
 */
export function parseArgs(argv: string[]): Invocation {
  const parsed: { invocation?: Invocation } = {};
  const program = createProgram((selected) => {
    parsed.invocation = selected;
  });
  program.parse(argv);

  if (!parsed.invocation) {
    throw new CommanderError(EXIT_FAILURE, 'nix-review.noSubcommand', 'error: a subcommand is required');
  }
  return parsed.invocation;
}

export function dispatch<S extends Subcommand>(invocation: Invocation<S>): Promise<number> {
  return HANDLERS[invocation.subcommand](invocation.options);
}

/**
 * Run the nix-review CLI and resolve with the process exit status.
 *
 * Flow: parse → check prerequisites → enter Buildenv → dispatch. Exit signals
 * received after parsing unwind the run instead of killing the process.
 */
export async function run(argv: string[]): Promise<number> {
  let invocation: Invocation;
  try {
    invocation = parseArgs(argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const failures = checkPrerequisites();
  if (failures.length > 0) {
    printErrors(failures);
    return EXIT_FAILURE;
  }

  const releaseSignals = trapExitSignals();
  try {
    return await withBuildenv(() => dispatch(invocation));
  } catch (error: unknown) {
    printError(sanitizeError(error));
    if (error instanceof CommandFailedError) {
      printFailureDetail(scrubSecrets(error.stderr));
    }
    return EXIT_FAILURE;
  } finally {
    releaseSignals();
  }
}
