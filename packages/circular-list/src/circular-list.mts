/**
 * Circular singly linked list
 *
 * The last element links back to the first. The head node keeps its
 * identity for the whole life of a non-empty list: `pushFront` and
 * `popFront` move values in and out of it instead of reseating the head.
 */

import type {
  CircularListOptions,
  ResolvedCircularListOptions,
} from "./config.mjs";
import type { IteratorOwner } from "./iterator.mjs";

import { resolveOptions } from "./config.mjs";
import { EmptyContainerError, InvalidIteratorError } from "./errors.mjs";
import {
  CircularListIterator,
  ConstCircularListIterator,
} from "./iterator.mjs";
import { detach, ListNode, swapValues } from "./node.mjs";

interface Chain<T> {
  head: ListNode<T> | undefined;
  size: number;
}

/**
 * Read-only view of a circular list
 */
export interface ReadonlyCircularList<T> extends Iterable<T> {
  readonly size: number;
  isEmpty(): boolean;
  front(): T;
  begin(): ConstCircularListIterator<T>;
  end(): ConstCircularListIterator<T>;
  cbegin(): ConstCircularListIterator<T>;
  cend(): ConstCircularListIterator<T>;
  forEach(callback: (value: T, index: number) => void): void;
  toArray(): T[];
}

export class CircularList<T> implements ReadonlyCircularList<T>, IteratorOwner {
  private head: ListNode<T> | undefined;
  private count = 0;
  private version = 0;
  private readonly options: ResolvedCircularListOptions<T>;

  constructor(options?: CircularListOptions<T>) {
    this.options = resolveOptions(options);
  }

  /**
   * Build a list whose traversal order is the order of `values`
   */
  static from<T>(
    values: Iterable<T>,
    options?: CircularListOptions<T>,
  ): CircularList<T> {
    const list = new CircularList<T>(options);
    const chain = CircularList.chainOf(values);
    list.head = chain.head;
    list.count = chain.size;
    return list;
  }

  static of<T>(...values: T[]): CircularList<T> {
    return CircularList.from(values);
  }

  /** @internal */
  get generation(): number {
    return this.version;
  }

  /** @internal */
  get strictIterators(): boolean {
    return this.options.strictIterators;
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.head === undefined;
  }

  /**
   * @throws {EmptyContainerError}
   */
  front(): T {
    if (!this.head) {
      throw new EmptyContainerError("read front");
    }
    return this.head.value;
  }

  /**
   * Insert `value` at the front in O(1).
   *
   * The new node is linked after the head and the two swap values, so the
   * head node stays the head. An iterator positioned at the head sees
   * `value` afterwards.
   */
  pushFront(value: T): void {
    if (!this.head) {
      this.head = new ListNode(value);
    } else {
      const node = new ListNode(value, this.head.next);
      this.head.next = node;
      swapValues(this.head, node);
    }
    this.count++;
  }

  /**
   * Remove the front value in O(1). The second value moves into the head
   * node and its old node is released.
   * @throws {EmptyContainerError}
   */
  popFront(): void {
    const head = this.head;
    if (!head) {
      throw new EmptyContainerError("pop front");
    }

    if (head.next === head) {
      detach(head);
      this.head = undefined;
    } else {
      const released = head.next;
      head.value = released.value;
      head.next = released.next;
      detach(released);
    }
    this.count--;
    this.version++;
  }

  /**
   * Link `value` right after `position`
   * @returns iterator at the new node
   * @throws {InvalidIteratorError} when `position` is unbound, at end, or from another list
   */
  insertAfter(
    position: ConstCircularListIterator<T>,
    value: T,
  ): CircularListIterator<T> {
    const node = position.positionIn(this, "insertAfter");
    const created = new ListNode(value, node.next);
    node.next = created;
    this.count++;
    return new CircularListIterator(this, created, this.head, false);
  }

  /**
   * Release the node following `position`. The head can only be removed
   * with `popFront`.
   * @returns iterator at the node now following `position`
   * @throws {InvalidIteratorError} when `position` is invalid or the next node is the head
   */
  eraseAfter(position: ConstCircularListIterator<T>): CircularListIterator<T> {
    const node = position.positionIn(this, "eraseAfter");
    const released = node.next;
    if (released === this.head) {
      throw new InvalidIteratorError("eraseAfter", "head");
    }

    node.next = released.next;
    detach(released);
    this.count--;
    this.version++;
    return new CircularListIterator(this, node.next, this.head, false);
  }

  clear(): void {
    const released = this.release();
    if (released > 0) {
      this.options.logger.debug("circular list cleared", { released });
    }
  }

  /**
   * Deep copy with the same options
   */
  clone(): CircularList<T> {
    const copy = new CircularList<T>(this.options);
    const chain = CircularList.chainOf(this);
    copy.head = chain.head;
    copy.count = chain.size;
    this.options.logger.debug("circular list cloned", { size: chain.size });
    return copy;
  }

  /**
   * Replace the contents with a deep copy of `source`. The copy is built
   * before any node of this list is released; assigning a list to itself
   * does nothing.
   */
  assign(source: ReadonlyCircularList<T>): this {
    if (source === this) {
      return this;
    }

    const chain = CircularList.chainOf(source);
    const released = this.release();
    this.head = chain.head;
    this.count = chain.size;
    this.options.logger.debug("circular list assigned", {
      released,
      size: chain.size,
    });
    return this;
  }

  /**
   * True when both lists have the same size and, read from some starting
   * offset of `other`, hold pointwise equal values. Rotations of the same
   * cycle are equal; a different relative order is not.
   *
   * Values compare with this list's `equals` option only, so when the two
   * lists carry different comparators `a.equals(b)` and `b.equals(a)` can
   * disagree.
   *
   * Tries every offset of `other` whose value matches this head, so the
   * worst case is quadratic.
   */
  equals(other: CircularList<T>): boolean {
    if (this.count !== other.count) {
      return false;
    }
    if (!this.head || !other.head) {
      return this.head === other.head;
    }

    const same = this.options.equals;
    let start = other.head;
    for (let offset = 0; offset < this.count; offset++) {
      if (same(this.head.value, start.value)) {
        let mine = this.head.next;
        let theirs = start.next;
        let matched = true;
        for (let step = 1; step < this.count; step++) {
          if (!same(mine.value, theirs.value)) {
            matched = false;
            break;
          }
          mine = mine.next;
          theirs = theirs.next;
        }
        if (matched) {
          return true;
        }
      }
      start = start.next;
    }
    return false;
  }

  /**
   * Iterator at the head. On an empty list this is already an end
   * iterator, so `begin().equals(end())`.
   */
  begin(): CircularListIterator<T> {
    return new CircularListIterator(
      this,
      this.head,
      this.head,
      this.head === undefined,
    );
  }

  end(): CircularListIterator<T> {
    return new CircularListIterator(this, this.head, this.head, true);
  }

  cbegin(): ConstCircularListIterator<T> {
    return new ConstCircularListIterator(
      this,
      this.head,
      this.head,
      this.head === undefined,
    );
  }

  cend(): ConstCircularListIterator<T> {
    return new ConstCircularListIterator(this, this.head, this.head, true);
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (const it = this.cbegin(); !it.isEnd; it.advance()) {
      yield it.value;
    }
  }

  forEach(callback: (value: T, index: number) => void): void {
    let index = 0;
    for (const value of this) {
      callback(value, index++);
    }
  }

  toArray(): T[] {
    return [...this];
  }

  /**
   * Unlink every node one at a time and reset to empty
   * @returns how many nodes were released
   */
  private release(): number {
    const head = this.head;
    if (!head) {
      return 0;
    }

    let node = head.next;
    while (node !== head) {
      const next = node.next;
      detach(node);
      node = next;
    }
    detach(head);

    const released = this.count;
    this.head = undefined;
    this.count = 0;
    this.version++;
    return released;
  }

  /**
   * Fresh cycle of nodes holding `values` in order
   */
  private static chainOf<T>(values: Iterable<T>): Chain<T> {
    let head: ListNode<T> | undefined;
    let tail: ListNode<T> | undefined;
    let size = 0;

    for (const value of values) {
      if (!head || !tail) {
        head = tail = new ListNode(value);
      } else {
        tail = tail.next = new ListNode(value, head);
      }
      size++;
    }
    return { head, size };
  }
}
