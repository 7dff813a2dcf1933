/**
 * Error classes raised by the circular list and its iterators
 */

import { inspect } from "node:util";

/**
 * Reasons an iterator can be refused
 */
export type InvalidIteratorReason =
  | "unbound"
  | "end"
  | "head"
  | "foreign"
  | "stale";

/**
 * Base error class for all circular list errors
 */
export class CircularListError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CircularListError";

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown by `front()` and `popFront()` on a list without elements
 */
export class EmptyContainerError extends CircularListError {
  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: list is empty`, "EMPTY_CONTAINER", {
      operation,
    });
    this.name = "EmptyContainerError";
  }
}

const reasonMessages: Record<InvalidIteratorReason, string> = {
  unbound: "iterator is not bound to a node",
  end: "iterator is at end",
  head: "the following node is the head",
  foreign: "iterator belongs to another list",
  stale: "iterator was created before nodes were released",
};

/**
 * Thrown when an iterator cannot be dereferenced, advanced, or used as a
 * position for `insertAfter`/`eraseAfter`
 */
export class InvalidIteratorError extends CircularListError {
  constructor(
    public readonly operation: string,
    public readonly reason: InvalidIteratorReason,
  ) {
    super(
      `Invalid iterator for ${operation}: ${reasonMessages[reason]}`,
      "INVALID_ITERATOR",
      { operation, reason },
    );
    this.name = "InvalidIteratorError";
  }
}

/**
 * Thrown when an option or environment setting cannot be used
 */
export class InvalidConfigError extends CircularListError {
  constructor(
    public readonly key: string,
    public readonly value: unknown,
    expected: string,
  ) {
    super(
      `Invalid value for ${key}: expected ${expected}, got ${inspect(value)}`,
      "INVALID_CONFIG",
      { key, value },
    );
    this.name = "InvalidConfigError";
  }
}

export function isCircularListError(
  error: unknown,
): error is CircularListError {
  return error instanceof CircularListError;
}

export function isEmptyContainerError(
  error: unknown,
): error is EmptyContainerError {
  return error instanceof EmptyContainerError;
}

export function isInvalidIteratorError(
  error: unknown,
): error is InvalidIteratorError {
  return error instanceof InvalidIteratorError;
}
