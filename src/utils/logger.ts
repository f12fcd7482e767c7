/**
 * Leveled logging for the scatter pipeline.
 *
 * Default level is WARN: skipped or infeasible categories, early stops and
 * rollbacks are visible, per-attempt traces are not.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

const TAG = "[scatter]";

let currentLevel: LogLevel = LogLevel.WARN;

export const Logger = {
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  getLevel: (): LogLevel => currentLevel,

  /** Per-attempt traces: tier, candidate, rejection reason. */
  debug: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.DEBUG) console.log(`${TAG} ${msg}`, ...args);
  },

  /** Run start, category plans, category summaries. */
  info: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.INFO) console.log(`${TAG} ${msg}`, ...args);
  },

  warn: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.WARN) console.warn(`${TAG} ${msg}`, ...args);
  },

  error: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.ERROR) console.error(`${TAG} ${msg}`, ...args);
  },
};

export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
