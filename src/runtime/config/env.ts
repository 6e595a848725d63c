/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * runtime reads, and the helpers that validate a raw environment object.
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
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Additional JSON log file (optional) */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // ENGINE
  // ===================================================================

  /** Default depth for game-tree exploration; -1 explores to the end */
  HYPERNIM_TREE_MAX_DEPTH: z.coerce.number().int().min(-1).default(-1),

  /**
   * Largest position the session evaluates. Grundy evaluation visits up to
   * 2^n positions, so anything bigger is reported without a value.
   */
  HYPERNIM_MAX_EVAL_VERTICES: z.coerce.number().int().positive().default(16),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return { success: false, errors };
  }

  return { success: true, data: result.data };
}

/**
 * Under Jest, JEST_WORKER_ID is always defined; treat the environment as
 * 'test' even if a .env file says otherwise.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
