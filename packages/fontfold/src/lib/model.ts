// fontfold/src/lib/model.ts
// Config Model — immutable description of repositories, folders, sources,
// styles and families. Produced once per invocation by the config loader;
// everything downstream reads it and nothing writes it.

import type { FieldPolicies } from 'libfold';
import type { SourceIdentity } from './errors.js';

// ─── Repositories ───────────────────────────────────────────────────

export type Repository =
    | { readonly id: string; readonly kind: 'http'; readonly url: string }
    | { readonly id: string; readonly kind: 'local'; readonly root: string };

// ─── Exclusion ──────────────────────────────────────────────────────

/** Inclusive codepoint range. */
export type UnitRange = readonly [from: number, to: number];

/**
 * Exclusion rule as declared:
 *   set        — explicit codepoints/ranges (inline or from a control file)
 *   block      — one named Unicode block/script (e.g. "Han")
 *   union      — whatever the named blocks together cover
 *   unassigned — unassigned, private-use and surrogate codepoints
 */
export type ExclusionRule =
    | { readonly kind: 'set'; readonly ranges: readonly UnitRange[]; readonly origin?: string }
    | { readonly kind: 'block'; readonly name: string }
    | { readonly kind: 'union'; readonly blocks: readonly string[] }
    | { readonly kind: 'unassigned' };

/** Exclusion rules compiled once at load time. */
export interface Exclusion {
    readonly rules: readonly ExclusionRule[];
    /** Disjoint, sorted ranges covering every excluded unit. */
    readonly ranges: readonly UnitRange[];
    /** Stable digest of `ranges`; part of cache tokens. */
    readonly fingerprint: string;
    excludes(unit: number): boolean;
}

// ─── Sources / Folders ──────────────────────────────────────────────

export interface Source extends SourceIdentity {
    readonly exclusion: Exclusion;
    /** Family names this source never contributes to. */
    readonly omitFrom: readonly string[];
    /** Reference whose codepoints this source is cut down to before instancing. */
    readonly subsetTo?: SourceIdentity;
}

export interface Folder {
    readonly id: string;
    /** Merge priority: lower rank merges first and wins conflicts. */
    readonly rank: number;
    /** The folder holding the base artifact whose structural tables are inherited. */
    readonly base: boolean;
    readonly sources: readonly Source[];
}

// ─── Styles / Families ──────────────────────────────────────────────

export interface Style {
    readonly name: string;
    /** Axis tag → requested value, e.g. { wght: 700, wdth: 100 }. */
    readonly axes: Readonly<Record<string, number>>;
}

export interface Family {
    readonly name: string;
    /** File-name form of the family name, e.g. "FoldHK". */
    readonly slug: string;
    /** Folder ids: shared folders for the base family, extension folders otherwise. */
    readonly folders: readonly string[];
    readonly styles: readonly string[];
}

// ─── Settings ───────────────────────────────────────────────────────

export interface FetchSettings {
    readonly retries: number;
    readonly minTimeoutMs: number;
    readonly timeoutMs: number;
    readonly concurrency: number;
}

/** Widening applied to vertical bounds unless the config overrides it. */
export const DEFAULT_FIELD_POLICIES: FieldPolicies = {
    'metrics.yMax': 'widen-max',
    'metrics.yMin': 'widen-min',
};

export interface MergeSettings {
    readonly maxUnits: number;
    readonly policies: FieldPolicies;
}

export interface BuildSettings {
    readonly outputDir: string;
    /** Output file extension; the artifact engine's own when absent. */
    readonly outputExtension?: string;
    readonly cacheDir: string;
    readonly reportPath: string;
    readonly concurrency: number;
    readonly fetch: FetchSettings;
    readonly merge: MergeSettings;
}

export interface BuildConfig {
    readonly repositories: readonly Repository[];
    /** Declared order; use `rank` for priority. */
    readonly folders: readonly Folder[];
    readonly styles: readonly Style[];
    readonly baseFamily: Family;
    readonly families: readonly Family[];
    readonly settings: BuildSettings;
}

// ─── Lookups ────────────────────────────────────────────────────────

export function findRepository(config: BuildConfig, id: string): Repository | undefined {
    return config.repositories.find(repo => repo.id === id);
}

export function findFolder(config: BuildConfig, id: string): Folder | undefined {
    return config.folders.find(folder => folder.id === id);
}

export function findStyle(config: BuildConfig, name: string): Style | undefined {
    return config.styles.find(style => style.name === name);
}

/** Every family, base first. */
export function allFamilies(config: BuildConfig): Family[] {
    return [config.baseFamily, ...config.families];
}
