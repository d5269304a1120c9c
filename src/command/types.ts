export interface CaptureExecutor {
  readonly kind: 'capture';
}

export interface InteractiveExecutor {
  readonly kind: 'interactive';
}

export interface DummyExecutor {
  readonly kind: 'dummy';
  readonly status: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * How a command is run:
 * - capture: buffers stdout/stderr for short, non-interactive programs (`ls`, `echo`, ...)
 * - interactive: child shares this process's stdin/stdout/stderr; result outputs are always ''
 * - dummy: no process; prints "Executed: <command>" and returns the configured outputs
 */
export type CommandExecutor = CaptureExecutor | InteractiveExecutor | DummyExecutor;

export const CommandExecutor = {
  capture: { kind: 'capture' } as const satisfies CaptureExecutor,
  interactive: { kind: 'interactive' } as const satisfies InteractiveExecutor,
  dummy(options: { status?: number; stdout?: string; stderr?: string } = {}): DummyExecutor {
    return {
      kind: 'dummy',
      status: options.status ?? 0,
      stdout: options.stdout ?? '',
      stderr: options.stderr ?? '',
    };
  },
};

export interface Invocation {
  file: string;
  args: string[];
}

export interface Launcher {
  readonly name: string;
  invocation(argv: readonly string[]): Invocation;
}

export interface CommandOptions {
  executor?: CommandExecutor;
  /** Absolute or relative to the current directory. */
  workingDirectory?: string;
  /** Replaces the child's environment entirely when set. */
  environment?: Record<string, string>;
  launcher?: Launcher;
}
