// Shared helpers for reading environment flags from the engine without
// pulling in the runtime config module. The engine stays free of logger
// and config imports; diagnostics are gated on these flags instead.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * When enabled, the Grundy evaluator prints one line per cache miss with the
 * evaluated position and its value. Expensive on large positions.
 */
export function isGrundyTraceEnabled(): boolean {
  return flagEnabled('HYPERNIM_GRUNDY_TRACE');
}

/**
 * Debug logging wrapper that suppresses ESLint no-console warnings.
 * The wrapped console.log is only invoked if the condition is true.
 *
 * @example
 * debugLog(isGrundyTraceEnabled(), '[Grundy]', key, value);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
