import { splitCommandString, quoted } from '../../../src/command/split.js';

describe('splitCommandString', () => {
  it('splits program and arguments on spaces', () => {
    expect(splitCommandString('echo -n Hello World')).toEqual(['echo', '-n', 'Hello', 'World']);
  });

  it('collapses runs of whitespace and ignores the ends', () => {
    expect(splitCommandString('  ls \t -a\n  /tmp  ')).toEqual(['ls', '-a', '/tmp']);
  });

  it('keeps pipe characters and quotes as literal tokens', () => {
    expect(splitCommandString("echo 'a b' | sort")).toEqual(['echo', "'a", "b'", '|', 'sort']);
  });

  it('returns nothing for a blank string', () => {
    expect(splitCommandString('   ')).toEqual([]);
  });
});

describe('quoted', () => {
  it('wraps text in single quotes', () => {
    expect(quoted('Hi!\nHello')).toBe("'Hi!\nHello'");
  });

  it('escapes embedded single quotes', () => {
    expect(quoted("it's")).toBe("'it'\\''s'");
  });
});
