export { Command } from './command/command.js';
export { CommandRunResult, pipeline } from './command/result.js';
export type { PipeStage } from './command/result.js';
export { CommandExecutor } from './command/types.js';
export type {
  CaptureExecutor,
  InteractiveExecutor,
  DummyExecutor,
  CommandOptions,
  Invocation,
  Launcher,
} from './command/types.js';
export { Launchers, getDefaultLauncher, setDefaultLauncher } from './command/launcher.js';
export { splitCommandString, quoted } from './command/split.js';
export { run, runWith, runOrThrow, echo } from './run.js';
export {
  ConsolePromptHandler,
  getPromptHandler,
  setPromptHandler,
  print,
  println,
  printError,
  printlnError,
} from './prompt/handler.js';
export type { PromptHandler } from './prompt/handler.js';
export {
  env,
  ProcessEnvironment,
  MemoryEnvironment,
  getEnvironmentSource,
  setEnvironmentSource,
  resolveChildEnvironment,
} from './env/environment.js';
export type { EnvironmentSource } from './env/environment.js';
export { currentDirectory, resolveDirectory, directoryExists } from './env/working-directory.js';
export { CmdKitError, CmdKitErrorCode, isCmdKitError } from './shared/errors.js';
export { loadConfig, loadLauncherName } from './shared/config.js';
export type { CmdKitConfig, LogLevel, LauncherName } from './shared/config.js';
export { logger } from './shared/logger.js';
