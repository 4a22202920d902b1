// fontfold/src/lib/helpers.ts
// Pure utility functions — no font domain knowledge.

import { createHash } from 'node:crypto';

// ─── Value Parsing (env / CLI) ──────────────────────────────────────

/**
 * Parse a positive integer. Absent values give `defaultValue`;
 * anything else that is not a positive integer throws.
 */
export function parsePositiveInt(value: unknown, defaultValue: number): number {
    if (value === null || typeof value === 'undefined' || value === '') return defaultValue;
    const num = typeof value === 'number' ? value : Number(String(value).trim());
    if (!Number.isInteger(num) || num < 1) {
        throw new Error(`Expected a positive integer, got: ${String(value)}`);
    }
    return num;
}

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 * parseList(' Regular, Bold ,,') => ['Regular', 'Bold']
 */
export function parseList(value: unknown): string[] {
    if (value === null || typeof value === 'undefined') return [];
    return String(value)
        .split(',')
        .map(item => item.trim())
        .filter(Boolean);
}

// ─── Utility ────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Stable hex digest of string parts. Parts are NUL-separated so that
 * ('ab', 'c') and ('a', 'bc') never collide.
 */
export function sha256Hex(...parts: string[]): string {
    const hash = createHash('sha256');
    parts.forEach((part, i) => {
        if (i > 0) hash.update('\0');
        hash.update(part);
    });
    return hash.digest('hex');
}

/** Hex sha256 of raw bytes. */
export function digestBytes(bytes: Uint8Array): string {
    return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Serialise a value with object keys sorted, so equal values always give
 * equal strings.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(value, (_key, val: unknown) => {
        if (val === null || typeof val !== 'object' || Array.isArray(val)) return val;
        const entries: Array<[string, unknown]> = Object.entries(val);
        return Object.fromEntries(entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    });
}

/**
 * Deep-freeze a value in place and return it.
 */
export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
