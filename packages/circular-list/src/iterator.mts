/**
 * Forward iterators over a circular list.
 *
 * An iterator is a view: (current node, head captured at construction, end
 * flag). Advancing onto the captured head sets the end flag, so a traversal
 * from `begin()` stops after exactly one cycle. Iterators own no nodes.
 *
 * Using an iterator after the list released nodes is outside the contract
 * unless the list was created with `strictIterators`, in which case such use
 * throws `InvalidIteratorError` with reason `stale`.
 */

import type { ListNode } from "./node.mjs";

import { InvalidIteratorError } from "./errors.mjs";

/**
 * What an iterator needs to know about the list it was taken from
 * @internal
 */
export interface IteratorOwner {
  /** Bumped every time the list releases nodes */
  readonly generation: number;
  readonly strictIterators: boolean;
}

/**
 * Read-only forward iterator
 */
export class ConstCircularListIterator<T> {
  protected node: ListNode<T> | undefined;
  protected atEnd: boolean;

  /** @internal */
  constructor(
    protected readonly owner: IteratorOwner,
    node: ListNode<T> | undefined,
    protected readonly head: ListNode<T> | undefined,
    atEnd: boolean,
    protected readonly generation: number = owner.generation,
  ) {
    this.node = node;
    this.atEnd = atEnd;
  }

  /**
   * True once a full cycle has been traversed
   */
  get isEnd(): boolean {
    return this.atEnd;
  }

  /**
   * The value at the current node
   * @throws {InvalidIteratorError} when unbound or at end
   */
  get value(): T {
    return this.bound("dereference").value;
  }

  /**
   * Move to the next node (pre-increment)
   * @throws {InvalidIteratorError} when unbound or at end
   */
  advance(): this {
    const next = this.bound("advance").next;
    this.node = next;
    if (next === this.head) {
      this.atEnd = true;
    }
    return this;
  }

  /**
   * Move to the next node and return the state before moving (post-increment)
   * @throws {InvalidIteratorError} when unbound or at end
   */
  postAdvance(): ConstCircularListIterator<T> {
    this.bound("advance");
    const before = this.clone();
    this.advance();
    return before;
  }

  clone(): ConstCircularListIterator<T> {
    return new ConstCircularListIterator(
      this.owner,
      this.node,
      this.head,
      this.atEnd,
      this.generation,
    );
  }

  /**
   * End iterators are equal to each other whatever node they last
   * referenced; otherwise both must reference the same node.
   */
  equals(other: ConstCircularListIterator<T>): boolean {
    if (this.atEnd || other.atEnd) {
      return this.atEnd && other.atEnd;
    }
    return this.node === other.node;
  }

  /**
   * Node this iterator designates as a position inside `owner`
   * @internal
   */
  positionIn(owner: IteratorOwner, operation: string): ListNode<T> {
    if (this.owner !== owner) {
      throw new InvalidIteratorError(operation, "foreign");
    }
    return this.bound(operation);
  }

  protected bound(operation: string): ListNode<T> {
    if (this.atEnd) {
      throw new InvalidIteratorError(operation, "end");
    }
    if (!this.node) {
      throw new InvalidIteratorError(operation, "unbound");
    }
    if (
      this.owner.strictIterators &&
      this.generation !== this.owner.generation
    ) {
      throw new InvalidIteratorError(operation, "stale");
    }
    return this.node;
  }
}

/**
 * Mutable forward iterator; assigning `value` writes into the node
 */
export class CircularListIterator<T> extends ConstCircularListIterator<T> {
  get value(): T {
    return this.bound("dereference").value;
  }

  set value(value: T) {
    this.bound("assign").value = value;
  }

  postAdvance(): CircularListIterator<T> {
    this.bound("advance");
    const before = this.clone();
    this.advance();
    return before;
  }

  clone(): CircularListIterator<T> {
    return new CircularListIterator(
      this.owner,
      this.node,
      this.head,
      this.atEnd,
      this.generation,
    );
  }
}
