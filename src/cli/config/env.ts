/**
 * Environment Variable Schema and Validation
 *
 * The game itself takes no configuration; these variables only steer where
 * and how much the process logs.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum level written to the log transports */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Format of the optional stderr transport; files are always JSON */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Combined log file path */
  LOG_FILE: z.string().optional(),

  /**
   * Mirror log entries to stderr. Off by default: stdout carries the game
   * screen.
   */
  LOG_TO_CONSOLE: z
    .string()
    .optional()
    .transform((val) => val === 'true' || val === '1'),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return {
      success: false,
      errors: errors.length > 0 ? errors : [{ path: '', message: result.error.message }],
    };
  }

  return { success: true, data: result.data };
}

/**
 * Under Jest the effective environment is always 'test', whatever NODE_ENV
 * a .env file put in place.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
