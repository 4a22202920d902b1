// libfold/src/rank.ts
// Rank system for positioning buckets of items.
//
// Every bucket carries an explicit integer rank:
//   lower rank  = folded earlier = higher precedence
//   same rank   = declaration order of the buckets
//   inside one  = declared item order
//
// Rank is the only ordering signal; bucket names never imply order.

import type { Ranked } from './types.js';

/**
 * Wrap items in a ranked segment.
 *
 * @param rank  - Sort position (lower folds first)
 * @param items - Items in declared order
 */
export function mkRank<T>(rank: number, items: readonly T[]): Ranked<T> {
    if (!Number.isFinite(rank)) {
        throw new Error(`Rank must be a finite number, got: ${rank}`);
    }
    return { __ranked: true, rank, items };
}

/**
 * Sort ranked segments by rank (stable) and flatten into a single array.
 */
export function flattenRanked<T>(segments: ReadonlyArray<Ranked<T>>): T[] {
    const sorted = [...segments].sort((a, b) => a.rank - b.rank);
    const items: T[] = [];
    for (const seg of sorted) {
        items.push(...seg.items);
    }
    return items;
}
