import { config } from '../config';

// One-time runtime warnings, gated by config.warnings
const seen = new Set<string>();

/**
 * Emit `message` through `console.warn` the first time `key` is seen, provided
 * `config.warnings` is enabled. Returns true when the message was written.
 */
export function warnOnce(key: string, message: string): boolean {
  if (!config.warnings || seen.has(key)) return false;
  // eslint-disable-next-line no-console
  console.warn(`[mazecraft] ${message}`);
  seen.add(key);
  return true;
}

/** Forget previously emitted warning keys (mainly for tests). */
export function resetWarnings(): void {
  seen.clear();
}
