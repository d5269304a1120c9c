import { Command } from './command/command.js';
import { splitCommandString } from './command/split.js';
import { CommandExecutor } from './command/types.js';
import type { CommandOptions } from './command/types.js';
import type { CommandRunResult } from './command/result.js';

/**
 * Runs a command with the capture executor. The command string is split on
 * whitespace and `args` are appended verbatim: `run('echo -n', 'Hello World')`.
 */
export function run(command: string, ...args: string[]): CommandRunResult {
  return runWith(command, args);
}

export function runWith(command: string, args: readonly string[], options: CommandOptions = {}): CommandRunResult {
  return new Command([...splitCommandString(command), ...args], options).execute();
}

/** Like `run()`, but throws NON_ZERO_EXIT when the command fails. */
export function runOrThrow(command: string, ...args: string[]): CommandRunResult {
  return run(command, ...args).orThrow();
}

/** `echo -n <text>`, handy as the head of a pipeline: `echo('YmFuYW5h').pipe('base64 -d')`. */
export function echo(text: string): CommandRunResult {
  return new Command(['echo', '-n', text], { executor: CommandExecutor.capture }).execute();
}
