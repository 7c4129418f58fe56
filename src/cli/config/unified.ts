/**
 * Unified Application Configuration
 *
 * Parses the environment, validates it with Zod, and exports a frozen config
 * object.
 */

import dotenv from 'dotenv';
import { ERROR_EXIT_CODE, GameErrorCode } from '../../shared/errors';
import { getEffectiveNodeEnv, parseEnv, type LogFormat, type LogLevel, type NodeEnv } from './env';

// Skip in test mode so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config({ quiet: true });
}

export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly isTest: boolean;
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
    readonly file: string | undefined;
    readonly toConsole: boolean;
  };
}

export class ConfigValidationError extends Error {
  readonly errors: ReadonlyArray<{ path: string; message: string }>;

  constructor(errors: ReadonlyArray<{ path: string; message: string }>) {
    super(
      'Invalid environment configuration:\n' +
        errors.map((error) => `  - ${error.path || 'root'}: ${error.message}`).join('\n')
    );
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export function buildConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const envResult = parseEnv(env);
  if (!envResult.success) {
    throw new ConfigValidationError(envResult.errors);
  }

  const data = envResult.data;
  const nodeEnv = getEffectiveNodeEnv(data);

  return Object.freeze({
    nodeEnv,
    isTest: nodeEnv === 'test',
    logging: Object.freeze({
      level: data.LOG_LEVEL,
      format: data.LOG_FORMAT,
      file: data.LOG_FILE?.trim() || undefined,
      toConsole: data.LOG_TO_CONSOLE,
    }),
  });
}

/**
 * Print every invalid variable and exit before anything else runs.
 */
function loadConfigOrExit(): AppConfig {
  try {
    return buildConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(error.message);
      process.exit(ERROR_EXIT_CODE[GameErrorCode.CONFIGURATION_ERROR]);
    }
    throw error;
  }
}

export const config: AppConfig = loadConfigOrExit();
