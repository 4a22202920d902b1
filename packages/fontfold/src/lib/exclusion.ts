// fontfold/src/lib/exclusion.ts
// Exclusion rules → compiled unit predicates.
//
// Rules are resolved exactly once, at config load: named blocks are looked up,
// unions expanded, control files parsed, and everything collapsed into one
// sorted list of disjoint ranges. Merges only ever call `excludes(unit)`.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { sha256Hex } from './helpers.js';
import type { Exclusion, ExclusionRule, UnitRange } from './model.js';

export const MAX_CODEPOINT = 0x10ffff;

// ─── Range Parsing ──────────────────────────────────────────────────

const RANGE_PATTERN =
    /^(?:U\+|0x)?([0-9A-F]{1,6})(?:\s*(?:\.\.|-)\s*(?:U\+|0x)?([0-9A-F]{1,6}))?$/i;

/**
 * Parse one codepoint or inclusive range. Numbers are hexadecimal.
 *
 * @example
 * parseUnitRange('U+4E00..U+9FFF') // [0x4e00, 0x9fff]
 * parseUnitRange('0x3400-0x4DBF')  // [0x3400, 0x4dbf]
 * parseUnitRange('41')             // [0x41, 0x41]
 */
export function parseUnitRange(text: string): UnitRange {
    const match = RANGE_PATTERN.exec(text.trim());
    if (!match) {
        throw new Error(`Invalid codepoint range: "${text}"`);
    }
    const from = parseInt(match[1], 16);
    const to = match[2] === undefined ? from : parseInt(match[2], 16);
    if (to < from) {
        throw new Error(`Reversed codepoint range: "${text}"`);
    }
    if (to > MAX_CODEPOINT) {
        throw new Error(`Codepoint out of range: "${text}"`);
    }
    return [from, to];
}

/**
 * Parse a control file: one codepoint or range per entry, entries separated
 * by newlines or commas, `#` starts a comment.
 *
 * @param text   - File contents
 * @param origin - File name used in error messages
 */
export function parseControlFile(text: string, origin: string): UnitRange[] {
    const ranges: UnitRange[] = [];
    const lines = text.split(/\r?\n/);
    lines.forEach((line, index) => {
        const content = line.replace(/#.*$/, '').trim();
        if (!content) return;
        for (const entry of content.split(',')) {
            if (!entry.trim()) continue;
            try {
                ranges.push(parseUnitRange(entry));
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                throw new Error(`${origin}:${index + 1}: ${message}`);
            }
        }
    });
    return ranges;
}

/**
 * Sort ranges and join overlapping or adjacent ones.
 */
export function normalizeRanges(ranges: readonly UnitRange[]): UnitRange[] {
    const sorted = [...ranges].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
    const result: Array<[number, number]> = [];
    for (const [from, to] of sorted) {
        const last = result[result.length - 1];
        if (last && from <= last[1] + 1) {
            last[1] = Math.max(last[1], to);
        } else {
            result.push([from, to]);
        }
    }
    return result;
}

// ─── Named Blocks ───────────────────────────────────────────────────

export type BlockTable = ReadonlyMap<string, readonly UnitRange[]>;

const BlockDataSchema = z.record(z.string().min(1), z.array(z.string()).min(1));

/**
 * Build a block table from `{ "Han": ["U+4E00..U+9FFF", ...] }` data.
 */
export function loadBlockTable(raw: unknown): BlockTable {
    const data = BlockDataSchema.parse(raw);
    const table = new Map<string, readonly UnitRange[]>();
    for (const [name, entries] of Object.entries(data)) {
        table.set(name, normalizeRanges(entries.map(parseUnitRange)));
    }
    return table;
}

/** Package data file; the same two levels up from src/lib and dist/lib. */
const BLOCKS_FILE = new URL('../../data/blocks.json', import.meta.url);

let builtin: BlockTable | undefined;

/** Named blocks shipped with the package, read on first use. */
export function builtinBlocks(): BlockTable {
    builtin ??= loadBlockTable(JSON.parse(readFileSync(BLOCKS_FILE, 'utf8')));
    return builtin;
}

// ─── Unassigned Codepoints ──────────────────────────────────────────

const UNASSIGNED = /^[\p{Cn}\p{Co}\p{Cs}]$/u;

let unassigned: readonly UnitRange[] | undefined;

/**
 * Ranges of every codepoint that is unassigned, private-use or a surrogate
 * in the runtime's Unicode data. Computed on first use.
 */
export function unassignedRanges(): readonly UnitRange[] {
    if (unassigned) return unassigned;
    const ranges: Array<[number, number]> = [];
    for (let cp = 0; cp <= MAX_CODEPOINT; cp++) {
        if (!UNASSIGNED.test(String.fromCodePoint(cp))) continue;
        const last = ranges[ranges.length - 1];
        if (last && last[1] === cp - 1) last[1] = cp;
        else ranges.push([cp, cp]);
    }
    unassigned = ranges;
    return ranges;
}

// ─── Compilation ────────────────────────────────────────────────────

function blockRanges(blocks: BlockTable, name: string): readonly UnitRange[] {
    const ranges = blocks.get(name);
    if (!ranges) {
        throw new Error(`Unknown block "${name}" (known: ${[...blocks.keys()].join(', ')})`);
    }
    return ranges;
}

function rulesToRanges(rules: readonly ExclusionRule[], blocks: BlockTable): UnitRange[] {
    const ranges: UnitRange[] = [];
    for (const rule of rules) {
        switch (rule.kind) {
            case 'set':
                ranges.push(...rule.ranges);
                break;
            case 'block':
                ranges.push(...blockRanges(blocks, rule.name));
                break;
            case 'union':
                for (const name of rule.blocks) {
                    ranges.push(...blockRanges(blocks, name));
                }
                break;
            case 'unassigned':
                ranges.push(...unassignedRanges());
                break;
        }
    }
    return normalizeRanges(ranges);
}

function containsUnit(ranges: readonly UnitRange[], unit: number): boolean {
    let lo = 0;
    let hi = ranges.length - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >> 1;
        const [from, to] = ranges[mid];
        if (unit < from) hi = mid - 1;
        else if (unit > to) lo = mid + 1;
        else return true;
    }
    return false;
}

/**
 * Compile declared rules into an exclusion predicate.
 * Throws on unknown block names.
 */
export function compileExclusion(
    rules: readonly ExclusionRule[],
    blocks: BlockTable = builtinBlocks(),
): Exclusion {
    const ranges = rulesToRanges(rules, blocks);
    return {
        rules,
        ranges,
        fingerprint: sha256Hex(JSON.stringify(ranges)),
        excludes: (unit: number) => containsUnit(ranges, unit),
    };
}

/** Exclusion that excludes nothing. */
export const NO_EXCLUSION: Exclusion = compileExclusion([], new Map());
