// tests/fold.test.ts — Tests for foldLayers
import { describe, it, expect } from 'vitest';
import { foldLayers } from '../src/index.js';

describe('foldLayers', () => {
    it('applies layers in order, each seeing the accumulated state', () => {
        const result = foldLayers<string[], string>(
            [],
            ['a', 'b', 'c'],
            (acc, layer) => [...acc, `${layer}${acc.length}`],
        );
        expect(result).toEqual(['a0', 'b1', 'c2']);
    });

    it('passes the layer index', () => {
        const indices: number[] = [];
        foldLayers(0, ['x', 'y'], (acc, _layer, i) => {
            indices.push(i);
            return acc;
        });
        expect(indices).toEqual([0, 1]);
    });

    it('returns base unchanged with no layers', () => {
        const base = { n: 1 };
        expect(foldLayers(base, [], () => ({ n: 2 }))).toBe(base);
    });

    it('propagates step errors', () => {
        expect(() => foldLayers(0, [1], () => {
            throw new Error('boom');
        })).toThrow('boom');
    });
});
