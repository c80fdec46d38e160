/**
 * @file logging.ts
 * @brief Console logging with a fixed prefix and an opt-in verbose channel.
 * @license See LICENSE.md
 */

const PREFIX = 'Planner:';

let verbose = false;

export function setVerboseLogging(enabled: boolean): void {
  verbose = enabled;
}

/** Debug output; dropped unless verbose logging is on. */
export function devLog(message: string, ...details: unknown[]): void {
  if (!verbose) return;
  console.debug(`${PREFIX} ${message}`, ...details);
}

export function logWarn(message: string, ...details: unknown[]): void {
  console.warn(`${PREFIX} ${message}`, ...details);
}

export function logError(message: string, ...details: unknown[]): void {
  console.error(`${PREFIX} ${message}`, ...details);
}
