// libfold/src/first-writer.ts
// First-writer-wins key selection.

import type { Claimed, Selection } from './types.js';

export interface SelectOptions<K> {
    /** Keys this layer must never contribute. Other layers are unaffected. */
    isExcluded?: (key: K) => boolean;
    /** Number of further keys the accumulator may still take. */
    limit?: number;
}

/**
 * Pick the candidates a layer may contribute: keys not yet claimed by an
 * earlier layer and not excluded by this one, up to `limit`.
 *
 * Exclusion is checked before the claim, so a key both excluded and
 * already present counts as excluded.
 */
export function selectUnclaimed<K>(
    claimed: Claimed<K>,
    candidates: Iterable<K>,
    options: SelectOptions<K> = {},
): Selection<K> {
    const limit = options.limit ?? Infinity;
    const selected: K[] = [];
    const seen = new Set<K>();
    let shadowed = 0;
    let excluded = 0;
    let truncated = 0;

    for (const key of candidates) {
        if (seen.has(key)) continue;
        seen.add(key);

        if (options.isExcluded?.(key)) {
            excluded++;
            continue;
        }
        if (claimed.has(key)) {
            shadowed++;
            continue;
        }
        if (selected.length >= limit) {
            truncated++;
            continue;
        }
        selected.push(key);
    }

    return { selected, shadowed, excluded, truncated };
}
