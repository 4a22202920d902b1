// tests/fixtures.ts — Shared test fixtures (in-memory fetcher, glyph documents)
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createArtifact, JsonGlyphEngine } from '../src/lib/json-engine.js';
import type { AxisRange, FontArtifact, UnitData } from '../src/lib/artifact.js';
import { FetchError } from '../src/lib/errors.js';
import type { Fetcher } from '../src/lib/fetcher.js';
import { createLogger } from '../src/lib/logger.js';
import type { Repository } from '../src/lib/model.js';

export const engine = new JsonGlyphEngine();

export const silentLogger = createLogger('test', {}, 'silent');

export function tempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'fontfold-'));
}

export function text(bytes: Uint8Array): string {
    return new TextDecoder().decode(bytes);
}

export function unit(glyph: string, advance = 500): UnitData {
    return { glyph, advance, lsb: 0 };
}

export interface ArtifactExtras {
    axes?: AxisRange[];
    globals?: Record<string, unknown>;
    structural?: Record<string, unknown>;
}

/** Artifact from `{ codepoint: glyph | UnitData }`. */
export function artifact(units: Record<number, string | UnitData>, extras: ArtifactExtras = {}): FontArtifact {
    return createArtifact({
        units: Object.entries(units).map(([cp, data]): [number, UnitData] => [
            Number(cp),
            typeof data === 'string' ? unit(data) : data,
        ]),
        ...extras,
    });
}

/** Encoded glyph document, as a repository would serve it. */
export function glyphs(units: Record<number, string | UnitData>, extras: ArtifactExtras = {}): Uint8Array {
    return engine.encode(artifact(units, extras));
}

/** Glyph strings by codepoint, for compact assertions. */
export function glyphMap(value: FontArtifact): Record<number, string> {
    const result: Record<number, string> = {};
    for (const [cp, data] of value.units) {
        result[cp] = data.glyph;
    }
    return result;
}

// ─── In-memory fetcher ──────────────────────────────────────────────

export class MemoryFetcher implements Fetcher {
    private readonly files = new Map<string, { bytes: Uint8Array; version: number }>();
    private readonly failures = new Map<string, boolean>();
    readonly fetchCalls: string[] = [];
    readonly revisionCalls: string[] = [];

    /** Add or replace a file; every replacement bumps its revision. */
    put(path: string, bytes: Uint8Array): void {
        const version = (this.files.get(path)?.version ?? 0) + 1;
        this.files.set(path, { bytes, version });
    }

    /** Make every request for `path` fail. */
    fail(path: string, transient = false): void {
        this.failures.set(path, transient);
    }

    restore(path: string): void {
        this.failures.delete(path);
    }

    async revision(repository: Repository, path: string): Promise<string> {
        this.revisionCalls.push(path);
        return `v${this.entry(repository, path).version}`;
    }

    async fetch(repository: Repository, path: string): Promise<Uint8Array> {
        this.fetchCalls.push(path);
        return this.entry(repository, path).bytes;
    }

    private entry(repository: Repository, path: string): { bytes: Uint8Array; version: number } {
        const source = { repository: repository.id, path };
        const transient = this.failures.get(path);
        if (transient !== undefined) {
            throw new FetchError(`${path} unavailable`, { transient, source });
        }
        const entry = this.files.get(path);
        if (!entry) {
            throw new FetchError(`${path} not found`, { transient: false, source });
        }
        return entry;
    }
}
