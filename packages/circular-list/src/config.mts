/**
 * Options accepted by `CircularList` and the environment settings that
 * fill in whatever the caller leaves out
 */

import type { LevelWithSilent } from "pino";
import type { BaseLogger } from "./logger.mjs";

import { InvalidConfigError } from "./errors.mjs";
import { loggerFactory } from "./logger.mjs";

/**
 * Decides whether two element values are equal
 */
export type ValueEquality<T> = (a: T, b: T) => boolean;

export interface CircularListOptions<T> {
  /**
   * Comparator used by `equals()`.
   * Defaults to SameValueZero: `===`, except that `NaN` equals `NaN`.
   */
  equals?: ValueEquality<T>;

  /**
   * Reject iterators created before the list last released nodes.
   * Defaults to `CIRCULAR_LIST_STRICT_ITERATORS`, or false.
   */
  strictIterators?: boolean;

  /** Defaults to a shared pino logger at `CIRCULAR_LIST_LOG_LEVEL` */
  logger?: BaseLogger;
}

export interface ResolvedCircularListOptions<T> {
  equals: ValueEquality<T>;
  strictIterators: boolean;
  logger: BaseLogger;
}

export interface EnvConfig {
  logLevel: LevelWithSilent;
  strictIterators: boolean;
}

export const LOG_LEVEL_ENV = "CIRCULAR_LIST_LOG_LEVEL";
export const STRICT_ITERATORS_ENV = "CIRCULAR_LIST_STRICT_ITERATORS";

export const DEFAULT_ENV_CONFIG: EnvConfig = {
  logLevel: "silent",
  strictIterators: false,
};

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function parseBoolean(key: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
    case "":
      return false;
    default:
      throw new InvalidConfigError(key, raw, "true, false, 1 or 0");
  }
}

/**
 * Reads list settings from environment variables.
 * Unset variables keep their defaults; malformed ones throw `InvalidConfigError`.
 */
export function readEnvConfig(
  env: Record<string, string | undefined> = process.env,
): EnvConfig {
  const config: EnvConfig = { ...DEFAULT_ENV_CONFIG };

  const level = env[LOG_LEVEL_ENV];
  if (level !== undefined) {
    const normalized = level.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new InvalidConfigError(LOG_LEVEL_ENV, level, LOG_LEVELS.join(", "));
    }
    config.logLevel = normalized;
  }

  const strict = env[STRICT_ITERATORS_ENV];
  if (strict !== undefined) {
    config.strictIterators = parseBoolean(STRICT_ITERATORS_ENV, strict);
  }

  return config;
}

let defaults: { env: EnvConfig; logger: BaseLogger } | undefined;

function sharedDefaults() {
  if (!defaults) {
    const env = readEnvConfig();
    const { logger } = loggerFactory({
      level: env.logLevel,
      name: "circular-list",
    });
    defaults = { env, logger };
  }
  return defaults;
}

/**
 * Forget the cached environment settings and default logger.
 * The next list created without options reads the environment again.
 */
export function resetDefaults(): void {
  defaults = undefined;
}

/**
 * SameValueZero, the comparison `Map`, `Set` and `Array.prototype.includes` use
 */
export const sameValueZero = <T,>(a: T, b: T): boolean =>
  a === b || (a !== a && b !== b);

export function resolveOptions<T>(
  options: CircularListOptions<T> = {},
): ResolvedCircularListOptions<T> {
  if (options.equals !== undefined && typeof options.equals !== "function") {
    throw new InvalidConfigError("equals", options.equals, "a function");
  }

  const equals = options.equals ?? sameValueZero;

  // only touch the environment for what the caller left out
  if (options.logger !== undefined && options.strictIterators !== undefined) {
    return {
      equals,
      strictIterators: options.strictIterators,
      logger: options.logger,
    };
  }

  const shared = sharedDefaults();
  return {
    equals,
    strictIterators: options.strictIterators ?? shared.env.strictIterators,
    logger: options.logger ?? shared.logger,
  };
}
