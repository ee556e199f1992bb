// ---------------------------------------------------------------------------
// Query — Bounded Max-Heap
// ---------------------------------------------------------------------------
// Holds the best `capacity` candidates seen so far. The root is the farthest
// of them under the order (sqDist, index), which gives the pruning bound.
// ---------------------------------------------------------------------------

import type { Neighbor } from '../types.js';

export interface NeighborHeap {
  readonly items: Neighbor[];
  readonly capacity: number;
}

/** True when `a` ranks after `b`: larger distance, then larger index. */
function ranksAfter(a: Neighbor, b: Neighbor): boolean {
  return a.sqDist > b.sqDist || (a.sqDist === b.sqDist && a.index > b.index);
}

export function heapCreate(capacity: number): NeighborHeap {
  return { items: [], capacity };
}

/**
 * Offer a candidate. While the heap is not full every candidate is kept;
 * afterwards a candidate replaces the root only if it ranks before it.
 */
export function heapOffer(heap: NeighborHeap, index: number, sqDist: number): void {
  const items = heap.items;
  if (items.length < heap.capacity) {
    items.push({ index, sqDist });
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!ranksAfter(items[i]!, items[parent]!)) break;
      const tmp = items[parent]!;
      items[parent] = items[i]!;
      items[i] = tmp;
      i = parent;
    }
    return;
  }

  const root = items[0]!;
  if (sqDist < root.sqDist || (sqDist === root.sqDist && index < root.index)) {
    items[0] = { index, sqDist };
    heapSiftDown(heap, 0);
  }
}

function heapSiftDown(heap: NeighborHeap, i: number): void {
  const items = heap.items;
  const n = items.length;
  for (;;) {
    let largest = i;
    const left = 2 * i + 1;
    const right = 2 * i + 2;
    if (left < n && ranksAfter(items[left]!, items[largest]!)) largest = left;
    if (right < n && ranksAfter(items[right]!, items[largest]!)) largest = right;
    if (largest === i) break;
    const tmp = items[i]!;
    items[i] = items[largest]!;
    items[largest] = tmp;
    i = largest;
  }
}

/** Squared distance a candidate must not exceed to enter; `Infinity` until full. */
export function heapBound(heap: NeighborHeap): number {
  if (heap.items.length < heap.capacity) return Number.POSITIVE_INFINITY;
  return heap.items[0]!.sqDist;
}

/** Heap contents in ascending (sqDist, index) order. */
export function heapDrain(heap: NeighborHeap): Neighbor[] {
  return heap.items
    .slice()
    .sort((a, b) => a.sqDist - b.sqDist || a.index - b.index);
}
