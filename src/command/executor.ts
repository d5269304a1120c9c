// Command execution boundary: every Command reaches the OS through executeCommand().
// Execution is synchronous; each stage's output is fully buffered before the next starts.
import os from 'os';
import execa from 'execa';
import { CmdKitError, CmdKitErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { println } from '../prompt/handler.js';
import { resolveChildEnvironment } from '../env/environment.js';
import { directoryExists } from '../env/working-directory.js';
import { CommandRunResult } from './result.js';
import type { Command } from './command.js';
import type { DummyExecutor } from './types.js';

// The fields read back from execa.sync(); exitCode is missing when the child never started
// or was killed by a signal, whatever execa's declared type says.
interface SpawnOutcome {
  exitCode?: number;
  signal?: string;
  stdout?: string;
  stderr?: string;
}

export function executeCommand(command: Command): CommandRunResult {
  const executor = command.executor;
  switch (executor.kind) {
    case 'capture':
      return captureExecute(command);
    case 'interactive':
      return interactiveExecute(command);
    case 'dummy':
      return dummyExecute(command, executor);
    default: {
      const exhaustive: never = executor;
      throw new Error(`Unknown executor: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function captureExecute(command: Command): CommandRunResult {
  const outcome = spawn(command, {
    stdout: 'pipe',
    stderr: 'pipe',
    ...(command.input !== undefined ? { input: command.input } : { stdin: 'inherit' as const }),
  });
  return new CommandRunResult(command, exitCodeOf(outcome, command), outcome.stdout ?? '', outcome.stderr ?? '');
}

function interactiveExecute(command: Command): CommandRunResult {
  const outcome = spawn(command, { stdio: 'inherit' });
  return new CommandRunResult(command, exitCodeOf(outcome, command), '', '');
}

function dummyExecute(command: Command, executor: DummyExecutor): CommandRunResult {
  println(`Executed: ${command.description}`);
  return new CommandRunResult(command, executor.status, executor.stdout, executor.stderr);
}

function spawn(command: Command, stdio: execa.SyncOptions): SpawnOutcome {
  if (!directoryExists(command.workingDirectory)) {
    throw new CmdKitError(
      CmdKitErrorCode.LAUNCH_FAILURE,
      `Working directory does not exist: ${command.workingDirectory}`,
      { context: { command: command.description } },
    );
  }

  const { file, args } = command.launcher.invocation(command.arguments);
  logger.debug(
    { file, args, cwd: command.workingDirectory, executor: command.executor.kind, launcher: command.launcher.name },
    'launching command',
  );

  let outcome: SpawnOutcome;
  try {
    outcome = execa.sync(file, args, {
      ...stdio,
      cwd: command.workingDirectory,
      env: resolveChildEnvironment(command.environment),
      extendEnv: false,
      reject: false,
      stripFinalNewline: false,
    });
  } catch (err) {
    // e.g. a NUL byte in an argument or environment value
    logger.warn({ command: command.description, cause: err instanceof Error ? err.message : String(err) }, 'launch failed');
    throw new CmdKitError(CmdKitErrorCode.LAUNCH_FAILURE, `Command failed to spawn: ${command.description}`, {
      context: { command: command.description },
      cause: err,
    });
  }

  logger.debug({ command: command.description, exitCode: outcome.exitCode, signal: outcome.signal }, 'command exited');
  return outcome;
}

// Signal terminations follow the shell convention of 128 + signal number.
function exitCodeOf(outcome: SpawnOutcome, command: Command): number {
  if (typeof outcome.exitCode === 'number') {
    return outcome.exitCode;
  }
  if (outcome.signal !== undefined) {
    return 128 + (isSignalName(outcome.signal) ? os.constants.signals[outcome.signal] : 0);
  }

  const cause = outcome instanceof Error ? outcome : new Error('process did not start');
  logger.warn({ command: command.description, cause: cause.message }, 'launch failed');
  throw new CmdKitError(CmdKitErrorCode.LAUNCH_FAILURE, `Command failed to spawn: ${command.description}`, {
    context: { command: command.description },
    cause,
  });
}

function isSignalName(name: string): name is keyof typeof os.constants.signals {
  return name in os.constants.signals;
}
