export interface HeapNode<T> {
  value: T;
  /** Lower values are served first. */
  priority: number;
  /** 1-based slot the node currently occupies. */
  position: number;
}

/**
 * A detached copy of a node. It keeps describing the slot it was taken from,
 * so it goes stale as soon as that slot changes hands.
 */
export type HeapNodeHandle<T> = Readonly<HeapNode<T>>;

export interface HeapSentinel {
  readonly sentinel: true;
}

export type HeapSlot<T> = HeapNode<T> | HeapSentinel;

export const SENTINEL: HeapSentinel = Object.freeze({ sentinel: true });

export function toHandle<T>({
  value,
  priority,
  position,
}: HeapNode<T>): HeapNodeHandle<T> {
  return { value, priority, position };
}
