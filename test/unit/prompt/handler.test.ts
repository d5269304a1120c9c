import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ConsolePromptHandler,
  getPromptHandler,
  print,
  printError,
  println,
  printlnError,
  setPromptHandler,
} from '../../../src/prompt/handler.js';
import { TestPromptHandler } from '../../helpers/test-prompt.js';

describe('print helpers', () => {
  let prompt: TestPromptHandler;

  beforeEach(() => {
    prompt = new TestPromptHandler().install();
  });

  afterEach(() => {
    prompt.restore();
  });

  it('route through the active handler in order', () => {
    print('a');
    println('b');
    printError('c');
    printlnError('d');
    expect(prompt.prints).toEqual(['a', 'b\n', 'ERR{c}', 'ERR{d\n}']);
  });

  it('read from the active handler', () => {
    prompt.prepare('yes', 'no');
    expect(getPromptHandler().read()).toBe('yes');
    expect(getPromptHandler().read()).toBe('no');
    expect(getPromptHandler().read()).toBe('');
  });
});

describe('setPromptHandler', () => {
  it('returns the previous handler', () => {
    const replacement = new TestPromptHandler();
    const previous = setPromptHandler(replacement);
    try {
      expect(getPromptHandler()).toBe(replacement);
    } finally {
      expect(setPromptHandler(previous)).toBe(replacement);
    }
  });
});

describe('ConsolePromptHandler', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes to stdout and stderr without adding newlines', () => {
    const out = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const err = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const handler = new ConsolePromptHandler();

    handler.print('to stdout');
    handler.printError('to stderr');

    expect(out).toHaveBeenCalledWith('to stdout');
    expect(err).toHaveBeenCalledWith('to stderr');
  });
});

describe('ConsolePromptHandler.read', () => {
  let tmpDir: string;
  let fd: number | undefined;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cmdkit-test-'));
  });

  afterEach(() => {
    if (fd !== undefined) fs.closeSync(fd);
    fd = undefined;
    fs.rmSync(tmpDir, { recursive: true });
  });

  function handlerReading(content: string): ConsolePromptHandler {
    const file = path.join(tmpDir, 'input.txt');
    fs.writeFileSync(file, content);
    fd = fs.openSync(file, 'r');
    return new ConsolePromptHandler(fd);
  }

  it('reads one line at a time without terminators', () => {
    const handler = handlerReading('first line\r\nsecond\n');
    expect(handler.read()).toBe('first line');
    expect(handler.read()).toBe('second');
  });

  it('returns the last unterminated line, then an empty string at end of input', () => {
    const handler = handlerReading('only');
    expect(handler.read()).toBe('only');
    expect(handler.read()).toBe('');
  });

  it('decodes multi-byte characters', () => {
    expect(handlerReading('žluťoučký\n').read()).toBe('žluťoučký');
  });
});
