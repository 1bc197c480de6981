import { parseArgs } from 'util';
import { createScoringConfig, DEFAULT_SCORING_CONFIG, parseTaskNumber, type ScoringConfig } from './config';
import { scoreAllTasks, scoreSingleTask } from './runner';
import type { ExecutionConfig, ExecutionMode, GridDisplay } from './types';

export type CliCommand =
  | { kind: 'help' }
  | {
      kind: 'single';
      taskId: number;
      verbose: boolean;
      config: ScoringConfig;
    }
  | {
      kind: 'all';
      verbose: boolean;
      execution: ExecutionConfig;
      config: ScoringConfig;
    };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: grid-task-scorer [task-number] [options]

Scores one task (task-number from 1 to ${DEFAULT_SCORING_CONFIG.numTasks}) or, with --all or no task number,
every task, writing the result logs to the logs directory.

Options:
  -a, --all                  Score all tasks and write the result logs
  -v, --verbose              Show the error behind every crashed example
      --data-dir <dir>       Task data directory (default: ${DEFAULT_SCORING_CONFIG.dataDir})
      --solutions-dir <dir>  Solution modules directory (default: ${DEFAULT_SCORING_CONFIG.solutionsDir})
      --logs-dir <dir>       Output directory for result logs (default: ${DEFAULT_SCORING_CONFIG.logsDir})
      --grids <mode>         Examples drawn for a single task: none, failed, all (default: ${DEFAULT_SCORING_CONFIG.showGrids})
      --execution <mode>     sequential, parallel or parallel-limit (default: sequential)
      --concurrency <n>      Tasks in flight for parallel-limit
  -h, --help                 Show this message`;

const GRID_DISPLAYS: readonly GridDisplay[] = ['none', 'failed', 'all'];
const EXECUTION_MODES: readonly ExecutionMode[] = ['sequential', 'parallel', 'parallel-limit'];

function parseChoice<T extends string>(value: string, choices: readonly T[], flag: string): T {
  const choice = choices.find((candidate) => candidate === value);
  if (!choice) {
    throw new UsageError(`${flag} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return choice;
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        all: { type: 'boolean', short: 'a', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        'data-dir': { type: 'string' },
        'solutions-dir': { type: 'string' },
        'logs-dir': { type: 'string' },
        grids: { type: 'string' },
        execution: { type: 'string' },
        concurrency: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Turns command-line arguments into a command. Every validation happens
 * here, before any task is loaded or graded.
 * @throws UsageError on unknown options or invalid values
 */
export function parseCliArgs(argv: string[], base: Partial<ScoringConfig> = {}): CliCommand {
  const { values, positionals } = parseRawArgs(argv);
  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one task number, got ${positionals.length}`);
  }

  const overrides: { -readonly [K in keyof ScoringConfig]?: ScoringConfig[K] } = { ...base };
  if (values['data-dir'] !== undefined) overrides.dataDir = values['data-dir'];
  if (values['solutions-dir'] !== undefined) overrides.solutionsDir = values['solutions-dir'];
  if (values['logs-dir'] !== undefined) overrides.logsDir = values['logs-dir'];
  if (values.grids !== undefined) overrides.showGrids = parseChoice(values.grids, GRID_DISPLAYS, '--grids');

  let config: ScoringConfig;
  try {
    config = createScoringConfig(overrides);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const verbose = values.verbose ?? false;
  const [taskNumber] = positionals;

  // No task number means all tasks, the same as --all
  if (values.all || taskNumber === undefined) {
    const mode =
      values.execution !== undefined
        ? parseChoice(values.execution, EXECUTION_MODES, '--execution')
        : 'sequential';
    const execution: ExecutionConfig = { mode };
    if (values.concurrency !== undefined) {
      execution.concurrency = parsePositiveInt(values.concurrency, '--concurrency');
    }
    if (mode === 'parallel-limit' && execution.concurrency === undefined) {
      throw new UsageError('--concurrency is required when --execution is "parallel-limit"');
    }
    return { kind: 'all', verbose, execution, config };
  }

  let taskId: number;
  try {
    taskId = parseTaskNumber(taskNumber, config.numTasks);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  return { kind: 'single', taskId, verbose, config };
}

/**
 * Runs the command line and resolves to the process exit code:
 * 0 on success, 1 when the run failed, 2 on invalid usage.
 */
export async function runCli(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${errorMessage}\n`);
    console.error(USAGE);
    return 2;
  }

  try {
    switch (command.kind) {
      case 'help':
        console.log(USAGE);
        return 0;
      case 'single':
        await scoreSingleTask(command.taskId, { config: command.config, verbose: command.verbose });
        return 0;
      case 'all':
        await scoreAllTasks({
          config: command.config,
          verbose: command.verbose,
          execution: command.execution,
        });
        return 0;
      default: {
        const _exhaustive: never = command;
        throw new Error(`Unknown command: ${JSON.stringify(_exhaustive)}`);
      }
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`Scoring failed: ${errorMessage}`);
    return 1;
  }
}
