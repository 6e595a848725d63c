/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object for the runtime layer (logger, game session).
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  parseEnv,
} from './env';

// Skip in test mode so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  app: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  engine: z.object({
    treeMaxDepth: z.number().int().min(-1),
    maxEvalVertices: z.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Build a validated config from a raw environment. Throws with every
 * offending variable listed when validation fails.
 */
export function loadConfig(
  rawEnv: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const envResult = parseEnv(rawEnv);
  if (!envResult.success || !envResult.data) {
    const details = (envResult.errors ?? [])
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const env = envResult.data;
  const nodeEnv = getEffectiveNodeEnv(env);

  const assembled = ConfigSchema.parse({
    nodeEnv,
    app: {
      name: 'hypernim',
      version: env.npm_package_version?.trim() || '1.0.0',
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    engine: {
      treeMaxDepth: env.HYPERNIM_TREE_MAX_DEPTH,
      maxEvalVertices: env.HYPERNIM_MAX_EVAL_VERTICES,
    },
  });

  return Object.freeze(assembled);
}

export const config = loadConfig();
