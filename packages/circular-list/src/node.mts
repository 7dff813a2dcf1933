/**
 * A node of a circular list. `next` is always set: a lone node links to
 * itself.
 */
export class ListNode<T> {
  next: ListNode<T>;

  constructor(
    public value: T,
    next?: ListNode<T>,
  ) {
    this.next = next ?? this;
  }
}

/**
 * Exchange the payloads of two nodes, leaving their links untouched
 */
export function swapValues<T>(a: ListNode<T>, b: ListNode<T>): void {
  const value = a.value;
  a.value = b.value;
  b.value = value;
}

/**
 * Cut a released node out of every cycle
 */
export function detach<T>(node: ListNode<T>): void {
  node.next = node;
}
