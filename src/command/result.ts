import { CmdKitError, CmdKitErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { printlnError } from '../prompt/handler.js';
import { Command } from './command.js';
import { splitCommandString } from './split.js';

export type PipeStage = string | readonly string[];

/**
 * Outcome of `Command.execute()`. Chain it into another command with `pipe()`;
 * the next command gets this result's stdout as its stdin.
 */
export class CommandRunResult {
  readonly command: Command;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: Command, exitCode: number, stdout = '', stderr = '') {
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }

  get isSuccess(): boolean {
    return this.exitCode === 0;
  }

  /**
   * Runs `command` with this result's stdout as input, using the same executor,
   * working directory, environment and launcher. When this result failed, prints an
   * error line and returns this result; the next command never runs.
   */
  pipe(command: string, ...args: string[]): CommandRunResult;
  pipe(argv: readonly string[]): CommandRunResult;
  pipe(commandOrArgv: PipeStage, ...args: string[]): CommandRunResult {
    const argv = typeof commandOrArgv === 'string'
      ? [...splitCommandString(commandOrArgv), ...args]
      : [...commandOrArgv];

    if (this.command.executor.kind === 'interactive') {
      throw new CmdKitError(
        CmdKitErrorCode.PIPELINE_PRECONDITION,
        'The result from interactive executor cannot be used for chaining',
        { context: { command: this.command.description } },
      );
    }
    if (argv.length === 0) {
      throw new CmdKitError(CmdKitErrorCode.PIPELINE_PRECONDITION, 'Cannot pipe to an empty command', {
        context: { command: this.command.description },
      });
    }

    if (!this.isSuccess) {
      logger.debug({ command: this.command.description, exitCode: this.exitCode, skipped: argv }, 'pipeline stopped');
      printlnError(
        `Cannot pipe to command '${this.command.description}' because previous command ends with status ${this.exitCode}.`,
      );
      return this;
    }
    return Command.fromPipe(this, argv).execute();
  }

  /** Throws NON_ZERO_EXIT unless the command succeeded. */
  orThrow(): this {
    if (!this.isSuccess) {
      throw new CmdKitError(
        CmdKitErrorCode.NON_ZERO_EXIT,
        `Command exited with ${this.exitCode}: ${this.command.description}`,
        {
          context: {
            command: this.command.description,
            exitCode: this.exitCode,
            stdout: this.stdout,
            stderr: this.stderr,
          },
        },
      );
    }
    return this;
  }
}

/** `pipeline(run('echo -n Hi!'), 'base64', ['base64', '-d'])` is the shell's `echo -n Hi! | base64 | base64 -d`. */
export function pipeline(first: CommandRunResult, ...stages: PipeStage[]): CommandRunResult {
  return stages.reduce<CommandRunResult>(
    (result, stage) => (typeof stage === 'string' ? result.pipe(stage) : result.pipe(stage)),
    first,
  );
}
