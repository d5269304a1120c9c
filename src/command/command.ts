import { CmdKitError, CmdKitErrorCode } from '../shared/errors.js';
import { resolveDirectory } from '../env/working-directory.js';
import { executeCommand } from './executor.js';
import { getDefaultLauncher } from './launcher.js';
import { CommandExecutor } from './types.js';
import type { CommandOptions, Launcher } from './types.js';
import type { CommandRunResult } from './result.js';

/**
 * A single external program invocation. Build one directly for control over the
 * working directory, environment or launcher:
 *
 * ```ts
 * new Command(['ls', '-a'], { workingDirectory: '/tmp' }).execute();
 * // run('ls -a') is the same with default settings
 * ```
 */
export class Command {
  readonly arguments: readonly string[];
  readonly executor: CommandExecutor;
  readonly workingDirectory: string;
  /** undefined inherits the active environment; any object (even `{}`) replaces it. */
  readonly environment?: Readonly<Record<string, string>>;
  readonly launcher: Launcher;
  /** stdin text; only set on commands built by `CommandRunResult.pipe()`. */
  readonly input?: string;

  constructor(argv: readonly string[], options: CommandOptions & { input?: string } = {}) {
    if (argv.length === 0) {
      throw new CmdKitError(CmdKitErrorCode.INVALID_COMMAND, 'Command has no program to run');
    }
    this.arguments = Object.freeze([...argv]);
    this.executor = options.executor ?? CommandExecutor.capture;
    this.workingDirectory = resolveDirectory(options.workingDirectory);
    this.environment = options.environment ? Object.freeze({ ...options.environment }) : undefined;
    this.launcher = options.launcher ?? getDefaultLauncher();
    this.input = options.input;
  }

  // Copies settings from the upstream command; never keeps a reference to the result itself.
  static fromPipe(previous: CommandRunResult, argv: readonly string[]): Command {
    const upstream = previous.command;
    return new Command(argv, {
      executor: upstream.executor,
      workingDirectory: upstream.workingDirectory,
      environment: upstream.environment,
      launcher: upstream.launcher,
      input: previous.stdout,
    });
  }

  get description(): string {
    return this.arguments.join(' ');
  }

  toString(): string {
    return this.description;
  }

  execute(): CommandRunResult {
    return executeCommand(this);
  }
}
