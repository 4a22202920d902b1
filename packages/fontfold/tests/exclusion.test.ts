// tests/exclusion.test.ts — Tests for range parsing and compiled exclusions
import { describe, it, expect } from 'vitest';
import {
    builtinBlocks,
    compileExclusion,
    loadBlockTable,
    NO_EXCLUSION,
    normalizeRanges,
    parseControlFile,
    parseUnitRange,
    unassignedRanges,
} from '../src/lib/exclusion.js';

const blocks = loadBlockTable({
    Latin: ['U+0041..U+005A'],
    Digits: ['U+0030..U+0039'],
});

describe('parseUnitRange', () => {
    it('accepts U+ ranges', () => {
        expect(parseUnitRange('U+4E00..U+9FFF')).toEqual([0x4e00, 0x9fff]);
    });

    it('accepts 0x ranges with a dash', () => {
        expect(parseUnitRange('0x3400-0x4DBF')).toEqual([0x3400, 0x4dbf]);
    });

    it('reads a bare number as one hexadecimal codepoint', () => {
        expect(parseUnitRange('41')).toEqual([0x41, 0x41]);
    });

    it('ignores case and surrounding space', () => {
        expect(parseUnitRange(' u+0041 ')).toEqual([0x41, 0x41]);
    });

    it('rejects reversed ranges', () => {
        expect(() => parseUnitRange('U+0050..U+0040')).toThrow('Reversed codepoint range: "U+0050..U+0040"');
    });

    it('rejects codepoints beyond U+10FFFF', () => {
        expect(() => parseUnitRange('U+110000')).toThrow('Codepoint out of range: "U+110000"');
    });

    it('rejects anything else', () => {
        expect(() => parseUnitRange('hello')).toThrow('Invalid codepoint range: "hello"');
    });
});

describe('parseControlFile', () => {
    it('reads one or more entries per line and skips comments', () => {
        const ranges = parseControlFile('# header\nU+0041\n0x42-0x44, 50 # trailing\n\n', 'ctl.txt');
        expect(ranges).toEqual([[0x41, 0x41], [0x42, 0x44], [0x50, 0x50]]);
    });

    it('reports the file and line of a bad entry', () => {
        expect(() => parseControlFile('U+0041\nnope', 'ctl.txt'))
            .toThrow('ctl.txt:2: Invalid codepoint range: "nope"');
    });
});

describe('normalizeRanges', () => {
    it('sorts and joins overlapping or adjacent ranges', () => {
        expect(normalizeRanges([[5, 7], [1, 2], [3, 4], [10, 12], [11, 11]]))
            .toEqual([[1, 7], [10, 12]]);
    });

    it('leaves an empty list empty', () => {
        expect(normalizeRanges([])).toEqual([]);
    });
});

describe('compileExclusion', () => {
    it('excludes the units of a named block', () => {
        const exclusion = compileExclusion([{ kind: 'block', name: 'Latin' }], blocks);
        expect(exclusion.excludes(0x41)).toBe(true);
        expect(exclusion.excludes(0x5a)).toBe(true);
        expect(exclusion.excludes(0x61)).toBe(false);
    });

    it('expands unions of blocks', () => {
        const exclusion = compileExclusion([{ kind: 'union', blocks: ['Latin', 'Digits'] }], blocks);
        expect(exclusion.ranges).toEqual([[0x30, 0x39], [0x41, 0x5a]]);
        expect(exclusion.excludes(0x35)).toBe(true);
        expect(exclusion.excludes(0x40)).toBe(false);
    });

    it('combines explicit sets with blocks', () => {
        const exclusion = compileExclusion([
            { kind: 'set', ranges: [[0x5b, 0x5b]] },
            { kind: 'block', name: 'Latin' },
        ], blocks);
        expect(exclusion.ranges).toEqual([[0x41, 0x5b]]);
    });

    it('rejects unknown blocks', () => {
        expect(() => compileExclusion([{ kind: 'block', name: 'Greek' }], blocks))
            .toThrow('Unknown block "Greek" (known: Latin, Digits)');
    });

    it('gives equal fingerprints to rules covering the same units', () => {
        const fromBlock = compileExclusion([{ kind: 'block', name: 'Latin' }], blocks);
        const fromSet = compileExclusion([{ kind: 'set', ranges: [[0x41, 0x50], [0x51, 0x5a]] }], blocks);
        const other = compileExclusion([{ kind: 'set', ranges: [[0x41, 0x59]] }], blocks);
        expect(fromSet.fingerprint).toBe(fromBlock.fingerprint);
        expect(other.fingerprint).not.toBe(fromBlock.fingerprint);
    });

    it('NO_EXCLUSION excludes nothing', () => {
        expect(NO_EXCLUSION.ranges).toEqual([]);
        expect(NO_EXCLUSION.excludes(0)).toBe(false);
    });
});

describe('builtinBlocks', () => {
    it('ships the CJK script blocks', () => {
        const table = builtinBlocks();
        expect([...table.keys()]).toEqual(expect.arrayContaining(['Han', 'Hangul', 'Tangut']));
    });

    it('covers the unified ideographs and syllables', () => {
        const han = compileExclusion([{ kind: 'block', name: 'Han' }]);
        const hangul = compileExclusion([{ kind: 'block', name: 'Hangul' }]);
        expect(han.excludes(0x4e00)).toBe(true);
        expect(han.excludes(0x20000)).toBe(true);
        expect(han.excludes(0x41)).toBe(false);
        expect(hangul.excludes(0xac00)).toBe(true);
        expect(hangul.excludes(0x4e00)).toBe(false);
    });
});

describe('unassigned rule', () => {
    const unassigned = compileExclusion([{ kind: 'unassigned' }], blocks);

    it('excludes unassigned, private-use and surrogate codepoints', () => {
        expect(unassigned.excludes(0x0378)).toBe(true);
        expect(unassigned.excludes(0xe000)).toBe(true);
        expect(unassigned.excludes(0xd800)).toBe(true);
        expect(unassigned.excludes(0x10ffff)).toBe(true);
    });

    it('keeps assigned characters', () => {
        expect(unassigned.excludes(0x41)).toBe(false);
        expect(unassigned.excludes(0x3042)).toBe(false);
        expect(unassigned.excludes(0x4e00)).toBe(false);
        expect(unassigned.excludes(0xac00)).toBe(false);
    });

    it('combines with the other rules', () => {
        const both = compileExclusion([{ kind: 'unassigned' }, { kind: 'block', name: 'Latin' }], blocks);
        expect(both.excludes(0x41)).toBe(true);
        expect(both.excludes(0xe000)).toBe(true);
        expect(both.excludes(0x30)).toBe(false);
    });

    it('computes the ranges once', () => {
        expect(unassignedRanges()).toBe(unassignedRanges());
        expect(unassignedRanges()).toContainEqual([0xd800, 0xdfff]);
    });
});
