export enum CmdKitErrorCode {
  INVALID_COMMAND = 'INVALID_COMMAND',
  LAUNCH_FAILURE = 'LAUNCH_FAILURE',
  PIPELINE_PRECONDITION = 'PIPELINE_PRECONDITION',
  NON_ZERO_EXIT = 'NON_ZERO_EXIT',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export interface CmdKitErrorOptions {
  context?: Record<string, unknown>;
  /** The underlying error, kept as the standard `Error.cause`. */
  cause?: unknown;
}

export class CmdKitError extends Error {
  readonly code: CmdKitErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: CmdKitErrorCode, message: string, options: CmdKitErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CmdKitError';
    this.code = code;
    this.context = options.context;
  }
}

export function isCmdKitError(err: unknown, code?: CmdKitErrorCode): err is CmdKitError {
  return err instanceof CmdKitError && (code === undefined || err.code === code);
}
