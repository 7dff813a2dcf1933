/**
 * Circular singly linked list with forward iterators and
 * rotation-invariant equality
 *
 * @packageDocumentation
 */

export { CircularList } from "./circular-list.mjs";
export type { ReadonlyCircularList } from "./circular-list.mjs";

export {
  CircularListIterator,
  ConstCircularListIterator,
} from "./iterator.mjs";

export {
  CircularListError,
  EmptyContainerError,
  InvalidConfigError,
  InvalidIteratorError,
  isCircularListError,
  isEmptyContainerError,
  isInvalidIteratorError,
} from "./errors.mjs";
export type { InvalidIteratorReason } from "./errors.mjs";

export {
  DEFAULT_ENV_CONFIG,
  LOG_LEVEL_ENV,
  STRICT_ITERATORS_ENV,
  readEnvConfig,
  resetDefaults,
  sameValueZero,
} from "./config.mjs";
export type {
  CircularListOptions,
  EnvConfig,
  ValueEquality,
} from "./config.mjs";

export { loggerFactory } from "./logger.mjs";
export type {
  BaseLogger,
  LoggerFactoryOptions,
  LoggerLevels,
  LoggerMessage,
  LoggerMeta,
} from "./logger.mjs";
