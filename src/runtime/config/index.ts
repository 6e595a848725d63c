/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from './config';
 */

export { config, loadConfig } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  getEffectiveNodeEnv,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
