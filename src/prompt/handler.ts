import fs from 'fs';

/**
 * Print and read functions for the command line prompt.
 * Swap the active handler with setPromptHandler() to capture output in tests.
 */
export interface PromptHandler {
  /** Writes to standard output. No newline is added. */
  print(text: string): void;
  /** Writes to error output. No newline is added. */
  printError(text: string): void;
  /** Reads one line from standard input without its terminator; '' when input is exhausted. */
  read(): string;
}

const EAGAIN_WAIT_MS = 10;

export class ConsolePromptHandler implements PromptHandler {
  private readonly inputFd: number;
  private readonly waitCell = new Int32Array(new SharedArrayBuffer(4));

  /** `inputFd` defaults to stdin. */
  constructor(inputFd = 0) {
    this.inputFd = inputFd;
  }

  print(text: string): void {
    process.stdout.write(text);
  }

  printError(text: string): void {
    process.stderr.write(text);
  }

  read(): string {
    const bytes: number[] = [];
    const chunk = Buffer.alloc(1);
    for (;;) {
      let count: number;
      try {
        count = fs.readSync(this.inputFd, chunk, 0, 1, null);
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EAGAIN') {
          // Non-blocking stdin with nothing buffered: sleep the thread before retrying.
          Atomics.wait(this.waitCell, 0, 0, EAGAIN_WAIT_MS);
          continue;
        }
        if (err instanceof Error && 'code' in err && err.code === 'EOF') break;
        throw err;
      }
      if (count === 0 || chunk[0] === 0x0a) break;
      bytes.push(chunk[0]);
    }
    return Buffer.from(bytes).toString('utf8').replace(/\r$/, '');
  }
}

let activeHandler: PromptHandler = new ConsolePromptHandler();

export function getPromptHandler(): PromptHandler {
  return activeHandler;
}

// Returns the previous handler so callers can restore it.
export function setPromptHandler(handler: PromptHandler): PromptHandler {
  const previous = activeHandler;
  activeHandler = handler;
  return previous;
}

export function print(text: string): void {
  activeHandler.print(text);
}

export function println(text: string): void {
  activeHandler.print(text + '\n');
}

export function printError(text: string): void {
  activeHandler.printError(text);
}

export function printlnError(text: string): void {
  activeHandler.printError(text + '\n');
}
