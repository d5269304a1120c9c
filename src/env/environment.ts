// Every read of the ambient environment on behalf of a child process goes through
// the active EnvironmentSource. Tests install a MemoryEnvironment instead of
// mutating process.env.

export interface EnvironmentSource {
  get(key: string): string | undefined;
  /** Passing undefined removes the variable. */
  set(key: string, value: string | undefined): void;
  keys(): string[];
  snapshot(): Record<string, string>;
}

export class ProcessEnvironment implements EnvironmentSource {
  get(key: string): string | undefined {
    return process.env[key];
  }

  set(key: string, value: string | undefined): void {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  keys(): string[] {
    return Object.keys(process.env);
  }

  snapshot(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) result[key] = value;
    }
    return result;
  }
}

export class MemoryEnvironment implements EnvironmentSource {
  private vars: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.vars = new Map(Object.entries(initial));
  }

  get(key: string): string | undefined {
    return this.vars.get(key);
  }

  set(key: string, value: string | undefined): void {
    if (value === undefined) {
      this.vars.delete(key);
    } else {
      this.vars.set(key, value);
    }
  }

  keys(): string[] {
    return Array.from(this.vars.keys());
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.vars);
  }
}

let activeSource: EnvironmentSource = new ProcessEnvironment();

export function getEnvironmentSource(): EnvironmentSource {
  return activeSource;
}

export function setEnvironmentSource(source: EnvironmentSource): EnvironmentSource {
  const previous = activeSource;
  activeSource = source;
  return previous;
}

/** Accessor for the active environment: `env.get('HOME')`, `env.set('DEBUG', '1')`. */
export const env = {
  get: (key: string): string | undefined => activeSource.get(key),
  set: (key: string, value: string | undefined): void => activeSource.set(key, value),
  keys: (): string[] => activeSource.keys(),
};

/**
 * The environment a child process receives: the command's own mapping when it has one,
 * otherwise a copy of the active source. The two are never merged.
 */
export function resolveChildEnvironment(override: Readonly<Record<string, string>> | undefined): Record<string, string> {
  return override !== undefined ? { ...override } : activeSource.snapshot();
}
