import path from 'path';
import { Command } from '../../../src/command/command.js';
import { CommandRunResult } from '../../../src/command/result.js';
import { Launchers, setDefaultLauncher } from '../../../src/command/launcher.js';
import { CommandExecutor } from '../../../src/command/types.js';
import { CmdKitErrorCode } from '../../../src/shared/errors.js';
import { thrownBy } from '../../helpers/test-prompt.js';

describe('Command', () => {
  beforeEach(() => {
    setDefaultLauncher(Launchers.env);
  });

  afterEach(() => {
    setDefaultLauncher(undefined);
  });

  it('rejects an empty argument list', () => {
    expect(thrownBy(() => new Command([]))).toMatchObject({ code: CmdKitErrorCode.INVALID_COMMAND });
  });

  it('applies defaults', () => {
    const cmd = new Command(['ls']);
    expect(cmd.executor).toBe(CommandExecutor.capture);
    expect(cmd.workingDirectory).toBe(process.cwd());
    expect(cmd.environment).toBeUndefined();
    expect(cmd.launcher).toBe(Launchers.env);
    expect(cmd.input).toBeUndefined();
  });

  it('resolves a relative working directory', () => {
    const cmd = new Command(['ls'], { workingDirectory: 'sub' });
    expect(cmd.workingDirectory).toBe(path.join(process.cwd(), 'sub'));
  });

  it('keeps its own copy of arguments and environment', () => {
    const argv = ['echo', 'a'];
    const environment = { K: 'v' };
    const cmd = new Command(argv, { environment });
    argv.push('b');
    environment.K = 'changed';

    expect(cmd.arguments).toEqual(['echo', 'a']);
    expect(cmd.environment).toEqual({ K: 'v' });
    expect(Object.isFrozen(cmd.arguments)).toBe(true);
  });

  it('keeps an empty environment instead of inheriting', () => {
    expect(new Command(['env'], { environment: {} }).environment).toEqual({});
  });

  it('describes itself as its arguments joined by spaces', () => {
    const cmd = new Command(['echo', '-n', 'Hello World']);
    expect(cmd.description).toBe('echo -n Hello World');
    expect(`${cmd}`).toBe('echo -n Hello World');
  });
});

describe('Command.fromPipe', () => {
  it('copies upstream settings and feeds upstream stdout as input', () => {
    const upstream = new Command(['producer'], {
      executor: CommandExecutor.dummy({ stdout: 'data' }),
      workingDirectory: '/tmp',
      environment: { K: 'v' },
      launcher: Launchers.sh,
    });
    const result = new CommandRunResult(upstream, 0, 'data\n', '');

    const next = Command.fromPipe(result, ['consumer', '-x']);

    expect(next.arguments).toEqual(['consumer', '-x']);
    expect(next.executor).toBe(upstream.executor);
    expect(next.workingDirectory).toBe('/tmp');
    expect(next.environment).toEqual({ K: 'v' });
    expect(next.launcher).toBe(Launchers.sh);
    expect(next.input).toBe('data\n');
  });
});

describe('CommandExecutor.dummy', () => {
  it('defaults to success with empty output', () => {
    expect(CommandExecutor.dummy()).toEqual({ kind: 'dummy', status: 0, stdout: '', stderr: '' });
  });

  it('keeps supplied values', () => {
    expect(CommandExecutor.dummy({ status: 123, stdout: 'out' })).toEqual({
      kind: 'dummy',
      status: 123,
      stdout: 'out',
      stderr: '',
    });
  });
});
