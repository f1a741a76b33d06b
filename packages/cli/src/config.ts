// Application configuration
//
// Read once at startup from the environment (and .env via dotenv), overridden
// by command-line flags, and passed explicitly to everything that needs it.

import * as os from 'node:os';
import * as path from 'node:path';
import { existsSync } from 'node:fs';
import { z } from 'zod';
import type { LogLevel } from '@property-tracker/runtime';
import type { sheets } from '@property-tracker/repositories';

export const DEFAULT_SPREADSHEET_NAME = 'new_property_price';

/**
 * Startup configuration problem. Fatal: the tool cannot run without it.
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type AppConfig = {
  /** Absolute path to the service-account JSON key */
  credentialsPath: string;
  spreadsheet: sheets.SpreadsheetLocator;
  /** Directory receiving analysis exports */
  exportDir: string;
  logLevel: LogLevel;
};

/**
 * Flag values that take precedence over the environment.
 */
export type ConfigOverrides = {
  credentialsPath?: string;
  spreadsheetId?: string;
  spreadsheetName?: string;
  exportDir?: string;
  logLevel?: LogLevel;
};

export type LoadConfigOptions = {
  homeDir?: string;
  cwd?: string;
  fileExists?: (filePath: string) => boolean;
};

// Blank variables count as unset
const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const EnvSchema = z.object({
  PT_CREDS_PATH: optionalText,
  PT_SPREADSHEET_ID: optionalText,
  PT_SPREADSHEET_NAME: optionalText,
  PT_EXPORT_DIR: optionalText,
  PT_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
    z.enum(['debug', 'info', 'warn', 'error']).optional()
  ),
});

/**
 * Expand a leading "~" and make the path absolute.
 */
export function resolveUserPath(filePath: string, homeDir: string, cwd: string): string {
  if (filePath === '~') {
    return homeDir;
  }
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(homeDir, filePath.slice(2));
  }
  return path.resolve(cwd, filePath);
}

/**
 * Build the application configuration.
 *
 * @throws ConfigurationError for invalid settings or a missing credentials file
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {}
): AppConfig {
  const {
    homeDir = os.homedir(),
    cwd = process.cwd(),
    fileExists = existsSync,
  } = options;

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
  }
  const vars = parsed.data;

  const credentialsPath = resolveUserPath(
    overrides.credentialsPath ??
      vars.PT_CREDS_PATH ??
      path.join(homeDir, '.secrets', 'property-tracker-creds.json'),
    homeDir,
    cwd
  );

  if (!fileExists(credentialsPath)) {
    throw new ConfigurationError(
      `Credentials file not found: ${credentialsPath}\n` +
        'Fix: set PT_CREDS_PATH to the full path of your service-account JSON key.'
    );
  }

  const spreadsheetId = overrides.spreadsheetId ?? vars.PT_SPREADSHEET_ID;
  const spreadsheet: sheets.SpreadsheetLocator = spreadsheetId
    ? { id: spreadsheetId }
    : { name: overrides.spreadsheetName ?? vars.PT_SPREADSHEET_NAME ?? DEFAULT_SPREADSHEET_NAME };

  return {
    credentialsPath,
    spreadsheet,
    exportDir: resolveUserPath(overrides.exportDir ?? vars.PT_EXPORT_DIR ?? '.', homeDir, cwd),
    logLevel: overrides.logLevel ?? vars.PT_LOG_LEVEL ?? 'info',
  };
}
