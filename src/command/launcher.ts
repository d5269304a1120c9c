// Launchers decide which OS program actually runs a command's argument vector.
// The env launcher is the default: /usr/bin/env resolves bare names through PATH,
// so an unknown program exits 127 instead of failing to spawn.
import { loadLauncherName } from '../shared/config.js';
import { getEnvironmentSource } from '../env/environment.js';
import type { LauncherName } from '../shared/config.js';
import type { Invocation, Launcher } from './types.js';

const ENV_PATH = '/usr/bin/env';

const SHELL_SYNTAX = /\||>|<|;|&&/;

// Shell launchers join the arguments into one script, so every token is shell-interpreted.
function shellLauncher(name: string): Launcher {
  return {
    name,
    invocation: (argv: readonly string[]): Invocation => ({ file: ENV_PATH, args: [name, '-c', argv.join(' ')] }),
  };
}

const sh = shellLauncher('sh');

const envLauncher: Launcher = {
  name: 'env',
  invocation(argv: readonly string[]): Invocation {
    // A single token with pipe or redirect syntax is a shell line, not a program name.
    if (argv.length === 1 && SHELL_SYNTAX.test(argv[0])) {
      return sh.invocation(argv);
    }
    return { file: ENV_PATH, args: [...argv] };
  },
};

export const Launchers: Readonly<Record<LauncherName, Launcher>> = {
  env: envLauncher,
  sh,
  bash: shellLauncher('bash'),
  zsh: shellLauncher('zsh'),
};

let overrideLauncher: Launcher | undefined;

export function getDefaultLauncher(): Launcher {
  return overrideLauncher ?? Launchers[loadLauncherName(getEnvironmentSource().get('CMDKIT_SHELL'))];
}

// Pass undefined to fall back to CMDKIT_SHELL.
export function setDefaultLauncher(launcher: Launcher | undefined): void {
  overrideLauncher = launcher;
}
