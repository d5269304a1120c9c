// Library configuration comes from environment variables only; there is no config file.
// Add new settings to ConfigSchema with a default so an empty environment always parses.
import { z } from 'zod';
import { CmdKitError, CmdKitErrorCode } from './errors.js';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const LauncherNameSchema = z.enum(['env', 'sh', 'bash', 'zsh']);

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LauncherName = z.infer<typeof LauncherNameSchema>;

const ConfigSchema = z.object({
  CMDKIT_LOG_LEVEL: LogLevelSchema.default('warn'),
  CMDKIT_SHELL: LauncherNameSchema.default('env'),
});

export interface CmdKitConfig {
  logLevel: LogLevel;
  launcher: LauncherName;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CmdKitConfig {
  const parsed = ConfigSchema.safeParse({
    CMDKIT_LOG_LEVEL: env['CMDKIT_LOG_LEVEL'] || undefined,
    CMDKIT_SHELL: env['CMDKIT_SHELL'] || undefined,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new CmdKitError(CmdKitErrorCode.INVALID_CONFIG, `Invalid cmdkit configuration: ${issues.join('; ')}`, {
      context: { issues },
    });
  }
  return {
    logLevel: parsed.data.CMDKIT_LOG_LEVEL,
    launcher: parsed.data.CMDKIT_SHELL,
  };
}

// Only CMDKIT_SHELL: a bad log level is tolerated by the logger and must not block running commands.
export function loadLauncherName(value: string | undefined): LauncherName {
  if (!value) return 'env';
  const parsed = LauncherNameSchema.safeParse(value);
  if (!parsed.success) {
    throw new CmdKitError(CmdKitErrorCode.INVALID_CONFIG, `Invalid cmdkit configuration: CMDKIT_SHELL: ${value}`, {
      context: { issues: parsed.error.issues.map(i => i.message) },
    });
  }
  return parsed.data;
}
