// tests/rank.test.ts — Tests for ranked segments
import { describe, it, expect } from 'vitest';
import { mkRank, flattenRanked } from '../src/index.js';

// ─── mkRank ─────────────────────────────────────────────────────────

describe('mkRank', () => {
    it('wraps items with an explicit rank', () => {
        const r = mkRank(20, ['a', 'b']);
        expect(r.__ranked).toBe(true);
        expect(r.rank).toBe(20);
        expect(r.items).toEqual(['a', 'b']);
    });

    it('rejects non-finite ranks', () => {
        expect(() => mkRank(Number.NaN, [])).toThrow(/finite/);
        expect(() => mkRank(Infinity, [])).toThrow(/finite/);
    });
});

// ─── flattenRanked ──────────────────────────────────────────────────

describe('flattenRanked', () => {
    it('orders segments by rank, lowest first', () => {
        const items = flattenRanked([
            mkRank(50, ['unifont']),
            mkRank(10, ['base']),
            mkRank(30, ['scripts']),
        ]);
        expect(items).toEqual(['base', 'scripts', 'unifont']);
    });

    it('keeps declared order inside a segment', () => {
        const items = flattenRanked([mkRank(20, ['z', 'a', 'm'])]);
        expect(items).toEqual(['z', 'a', 'm']);
    });

    it('stable sort: same rank keeps segment declaration order', () => {
        const items = flattenRanked([
            mkRank(20, ['first']),
            mkRank(20, ['second']),
        ]);
        expect(items).toEqual(['first', 'second']);
    });

    it('does not reorder the input array', () => {
        const segments = [mkRank(2, ['b']), mkRank(1, ['a'])];
        flattenRanked(segments);
        expect(segments.map(s => s.rank)).toEqual([2, 1]);
    });

    it('returns empty for no segments', () => {
        expect(flattenRanked([])).toEqual([]);
    });
});
