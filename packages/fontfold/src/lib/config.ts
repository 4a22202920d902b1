// fontfold/src/lib/config.ts
// Config Loader — JSON file → validated, resolved, frozen BuildConfig.
//
// Two passes:
//   1. Shape: zod schema (types, defaults, unknown keys rejected)
//   2. Semantics: cross-references, uniqueness, base-folder rules
// Every issue from a pass is collected into a single ConfigError.

import { readFile as fsReadFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { z } from 'zod';
import { FIELD_POLICIES } from 'libfold';
import { ConfigError, errorMessage } from './errors.js';
import { builtinBlocks, compileExclusion, parseControlFile, parseUnitRange } from './exclusion.js';
import type { BlockTable } from './exclusion.js';
import { deepFreeze, parseList, parsePositiveInt } from './helpers.js';
import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { DEFAULT_FIELD_POLICIES } from './model.js';
import type {
    BuildConfig,
    ExclusionRule,
    Family,
    Folder,
    Repository,
    Source,
    Style,
    UnitRange,
} from './model.js';

export const DEFAULT_CONFIG_FILE = 'fontfold.json';
export const DEFAULT_MAX_UNITS = 65535;

// ─── Schema ─────────────────────────────────────────────────────────

const Id = z.string().min(1);
const Codepoint = z.number().int().min(0).max(0x10ffff);

const RangeSchema = z.union([
    z.tuple([Codepoint, Codepoint]).refine(([from, to]) => from <= to, 'Reversed codepoint range'),
    z.string().min(1),
]);

const ExcludeSchema = z.union([
    z.object({ units: z.array(Codepoint).min(1) }).strict(),
    z.object({ ranges: z.array(RangeSchema).min(1) }).strict(),
    z.object({ file: z.string().min(1) }).strict(),
    z.object({ block: Id }).strict(),
    z.object({ union: z.array(Id).min(1) }).strict(),
    z.object({ unassigned: z.literal(true) }).strict(),
]);

const SourceSchema = z.object({
    repository: Id,
    path: z.string().min(1),
    exclude: z.array(ExcludeSchema).default([]),
    omitFrom: z.array(Id).default([]),
    subsetTo: z.object({ repository: Id, path: z.string().min(1) }).strict().optional(),
}).strict();

const FolderSchema = z.object({
    id: Id,
    rank: z.number().int(),
    base: z.boolean().default(false),
    sources: z.array(SourceSchema),
}).strict();

const StyleSchema = z.object({
    name: z.string().regex(/^[A-Za-z0-9]+$/, 'Style names are alphanumeric'),
    axes: z.record(z.string().regex(/^[A-Za-z0-9 ]{4}$/, 'Axis tags are four characters'), z.number()),
}).strict();

const FamilySchema = z.object({
    name: z.string().min(1),
    slug: z.string().regex(/^[A-Za-z0-9_-]+$/, 'Slugs contain letters, digits, "_" and "-" only').optional(),
    folders: z.array(Id),
    styles: z.array(Id).optional(),
}).strict();

const PolicySchema = z.enum(FIELD_POLICIES);

const RepositorySchema = z.discriminatedUnion('kind', [
    z.object({ id: Id, kind: z.literal('http'), url: z.string().url() }).strict(),
    z.object({ id: Id, kind: z.literal('local'), root: z.string().min(1) }).strict(),
]);

export const ConfigFileSchema = z.object({
    repositories: z.array(RepositorySchema),
    folders: z.array(FolderSchema),
    styles: z.array(StyleSchema).min(1),
    baseFamily: FamilySchema,
    families: z.array(FamilySchema).default([]),
    output: z.object({
        dir: z.string().min(1).default('dist'),
        extension: z.string().regex(/^[A-Za-z0-9]+$/).optional(),
    }).strict().default({}),
    cache: z.object({
        dir: z.string().min(1).default('.fontfold-cache'),
    }).strict().default({}),
    fetch: z.object({
        retries: z.number().int().min(0).default(3),
        minTimeoutMs: z.number().int().min(0).default(500),
        timeoutMs: z.number().int().positive().default(30_000),
        concurrency: z.number().int().positive().default(4),
    }).strict().default({}),
    merge: z.object({
        maxUnits: z.number().int().positive().default(DEFAULT_MAX_UNITS),
        policies: z.record(z.string().min(1), PolicySchema).default({}),
    }).strict().default({}),
    build: z.object({
        concurrency: z.number().int().positive().default(2),
    }).strict().default({}),
    report: z.object({
        path: z.string().min(1).optional(),
    }).strict().default({}),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
type SourceEntry = z.infer<typeof SourceSchema>;
type ExcludeEntry = z.infer<typeof ExcludeSchema>;
type FamilyEntry = z.infer<typeof FamilySchema>;

// ─── Overrides ──────────────────────────────────────────────────────

/** Values that take precedence over the config file (CLI flags, environment). */
export interface ConfigOverrides {
    outputDir?: string;
    cacheDir?: string;
    concurrency?: number;
}

/** Settings read from FONTFOLD_* environment variables. */
export interface EnvSettings extends ConfigOverrides {
    configPath?: string;
    logLevel?: LogLevel;
}

/**
 * Read FONTFOLD_* variables. Malformed values raise a ConfigError naming
 * the variable.
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
    const issues: string[] = [];
    const settings: EnvSettings = {};

    if (env.FONTFOLD_CONFIG) settings.configPath = env.FONTFOLD_CONFIG;
    if (env.FONTFOLD_CACHE_DIR) settings.cacheDir = env.FONTFOLD_CACHE_DIR;
    if (env.FONTFOLD_OUTPUT_DIR) settings.outputDir = env.FONTFOLD_OUTPUT_DIR;

    if (env.FONTFOLD_CONCURRENCY) {
        try {
            settings.concurrency = parsePositiveInt(env.FONTFOLD_CONCURRENCY, 1);
        } catch (err) {
            issues.push(`FONTFOLD_CONCURRENCY: ${errorMessage(err)}`);
        }
    }

    const level = env.FONTFOLD_LOG_LEVEL?.toLowerCase();
    if (level) {
        if (isLogLevel(level)) settings.logLevel = level;
        else issues.push(`FONTFOLD_LOG_LEVEL: Unknown level "${env.FONTFOLD_LOG_LEVEL}"`);
    }

    if (issues.length > 0) throw new ConfigError('Invalid environment', issues);
    return settings;
}

// ─── Semantic Validation ────────────────────────────────────────────

function findDuplicates(values: readonly string[]): string[] {
    const seen = new Set<string>();
    const dupes = new Set<string>();
    for (const value of values) {
        if (seen.has(value)) dupes.add(value);
        seen.add(value);
    }
    return [...dupes];
}

function familySlug(family: FamilyEntry): string {
    return family.slug ?? family.name.replace(/\s+/g, '');
}

/**
 * Cross-reference checks the schema cannot express.
 * Returns one message per issue; empty when the config is consistent.
 */
export function validateConfig(file: ConfigFile): string[] {
    const issues: string[] = [];
    const repoIds = new Set(file.repositories.map(r => r.id));
    const styleNames = new Set(file.styles.map(s => s.name));
    const foldersById = new Map(file.folders.map(f => [f.id, f]));
    const families = [file.baseFamily, ...file.families];
    const extensionNames = new Set(file.families.map(f => f.name));
    const sharedIds = new Set(file.baseFamily.folders);

    for (const id of findDuplicates(file.repositories.map(r => r.id))) {
        issues.push(`repositories: duplicate id "${id}"`);
    }
    for (const id of findDuplicates(file.folders.map(f => f.id))) {
        issues.push(`folders: duplicate id "${id}"`);
    }
    for (const rank of findDuplicates(file.folders.map(f => String(f.rank)))) {
        issues.push(`folders: duplicate rank ${rank}`);
    }
    for (const name of findDuplicates(file.styles.map(s => s.name))) {
        issues.push(`styles: duplicate name "${name}"`);
    }
    for (const name of findDuplicates(families.map(f => f.name))) {
        issues.push(`families: duplicate name "${name}"`);
    }
    for (const slug of findDuplicates(families.map(familySlug))) {
        issues.push(`families: duplicate slug "${slug}"`);
    }

    // Folders and their sources
    file.folders.forEach((folder, fi) => {
        const where = `folders[${fi}] (${folder.id})`;
        const shared = sharedIds.has(folder.id);

        for (const key of findDuplicates(folder.sources.map(s => `${s.repository}:${s.path}`))) {
            issues.push(`${where}: duplicate source "${key}"`);
        }

        folder.sources.forEach((source, si) => {
            const at = `${where}.sources[${si}]`;
            if (!repoIds.has(source.repository)) {
                issues.push(`${at}: unknown repository "${source.repository}"`);
            }
            if (source.omitFrom.length > 0 && shared) {
                issues.push(`${at}: omitFrom is only allowed on sources of extension folders`);
            }
            if (source.subsetTo && !repoIds.has(source.subsetTo.repository)) {
                issues.push(`${at}: subsetTo names unknown repository "${source.subsetTo.repository}"`);
            }
            for (const name of source.omitFrom) {
                if (!extensionNames.has(name)) {
                    issues.push(`${at}: omitFrom names unknown family "${name}"`);
                }
            }
        });
    });

    // Base folder
    const baseFolders = file.folders.filter(f => f.base);
    if (baseFolders.length > 1) {
        issues.push(`folders: only one folder may be marked base (found ${baseFolders.map(f => f.id).join(', ')})`);
    }
    const baseFolder = baseFolders[0];
    if (baseFolder) {
        if (file.baseFamily.folders[0] !== baseFolder.id) {
            issues.push(`baseFamily: first folder must be the base folder "${baseFolder.id}"`);
        }
        if (baseFolder.sources.length !== 1) {
            issues.push(`folders (${baseFolder.id}): the base folder must hold exactly one source`);
        }
        const lowerRanked = file.baseFamily.folders
            .map(id => foldersById.get(id))
            .filter(folder => folder !== undefined && folder.rank < baseFolder.rank);
        if (lowerRanked.length > 0) {
            issues.push(`folders (${baseFolder.id}): the base folder must have the lowest rank of the shared folders`);
        }
    }

    // Families
    families.forEach((family, i) => {
        const where = i === 0 ? 'baseFamily' : `families[${i - 1}] (${family.name})`;

        for (const id of findDuplicates(family.folders)) {
            issues.push(`${where}: folder "${id}" listed twice`);
        }
        for (const id of family.folders) {
            if (!foldersById.has(id)) {
                issues.push(`${where}: unknown folder "${id}"`);
            } else if (i > 0 && sharedIds.has(id)) {
                issues.push(`${where}: folder "${id}" is shared and cannot also be an extension folder`);
            }
        }
        for (const style of family.styles ?? []) {
            if (!styleNames.has(style)) {
                issues.push(`${where}: unknown style "${style}"`);
            }
        }
    });

    return issues;
}

// ─── Resolution ─────────────────────────────────────────────────────

export interface ParseOptions {
    /** Directory relative paths resolve against. */
    baseDir: string;
    overrides?: ConfigOverrides;
    blocks?: BlockTable;
    /** Reads exclusion control files. */
    readFile?: (path: string) => Promise<string>;
}

function resolveRepository(repo: ConfigFile['repositories'][number], baseDir: string): Repository {
    if (repo.kind === 'http') {
        const url = repo.url.endsWith('/') ? repo.url : `${repo.url}/`;
        return { id: repo.id, kind: 'http', url };
    }
    return { id: repo.id, kind: 'local', root: resolve(baseDir, repo.root) };
}

async function resolveRule(
    entry: ExcludeEntry,
    baseDir: string,
    readFile: (path: string) => Promise<string>,
): Promise<ExclusionRule> {
    if ('units' in entry) {
        return { kind: 'set', ranges: entry.units.map((unit): UnitRange => [unit, unit]) };
    }
    if ('ranges' in entry) {
        return {
            kind: 'set',
            ranges: entry.ranges.map(range => (typeof range === 'string' ? parseUnitRange(range) : range)),
        };
    }
    if ('file' in entry) {
        const text = await readFile(resolve(baseDir, entry.file));
        return { kind: 'set', ranges: parseControlFile(text, entry.file), origin: entry.file };
    }
    if ('block' in entry) {
        return { kind: 'block', name: entry.block };
    }
    if ('unassigned' in entry) {
        return { kind: 'unassigned' };
    }
    return { kind: 'union', blocks: entry.union };
}

async function resolveSource(
    entry: SourceEntry,
    where: string,
    options: Required<Pick<ParseOptions, 'baseDir' | 'blocks' | 'readFile'>>,
    issues: string[],
): Promise<Source | undefined> {
    try {
        const rules: ExclusionRule[] = [];
        for (const rule of entry.exclude) {
            rules.push(await resolveRule(rule, options.baseDir, options.readFile));
        }
        return {
            repository: entry.repository,
            path: entry.path,
            exclusion: compileExclusion(rules, options.blocks),
            omitFrom: entry.omitFrom,
            ...(entry.subsetTo ? { subsetTo: entry.subsetTo } : {}),
        };
    } catch (err) {
        issues.push(`${where}: ${errorMessage(err)}`);
        return undefined;
    }
}

function resolveFamily(entry: FamilyEntry, styles: readonly Style[]): Family {
    return {
        name: entry.name,
        slug: familySlug(entry),
        folders: entry.folders,
        styles: entry.styles ?? styles.map(s => s.name),
    };
}

/**
 * Validate and resolve raw config data.
 *
 * @throws ConfigError listing every schema or semantic issue
 */
export async function parseConfig(raw: unknown, options: ParseOptions): Promise<BuildConfig> {
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(
            'Invalid configuration',
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }
    const file = parsed.data;

    const issues = validateConfig(file);
    if (issues.length > 0) {
        throw new ConfigError('Inconsistent configuration', issues);
    }

    const { baseDir, overrides = {} } = options;
    const resolveOptions = {
        baseDir,
        blocks: options.blocks ?? builtinBlocks(),
        readFile: options.readFile ?? ((path: string) => fsReadFile(path, 'utf8')),
    };

    const folders: Folder[] = [];
    for (const [fi, folder] of file.folders.entries()) {
        const sources: Source[] = [];
        for (const [si, entry] of folder.sources.entries()) {
            const source = await resolveSource(entry, `folders[${fi}].sources[${si}]`, resolveOptions, issues);
            if (source) sources.push(source);
        }
        folders.push({ id: folder.id, rank: folder.rank, base: folder.base, sources });
    }
    if (issues.length > 0) {
        throw new ConfigError('Invalid exclusion rules', issues);
    }

    const styles: Style[] = file.styles.map(s => ({ name: s.name, axes: s.axes }));
    // Overrides come from the caller's working directory, file paths from the config's
    const outputDir = overrides.outputDir ? resolve(overrides.outputDir) : resolve(baseDir, file.output.dir);
    const cacheDir = overrides.cacheDir ? resolve(overrides.cacheDir) : resolve(baseDir, file.cache.dir);

    const config: BuildConfig = {
        repositories: file.repositories.map(repo => resolveRepository(repo, baseDir)),
        folders,
        styles,
        baseFamily: resolveFamily(file.baseFamily, styles),
        families: file.families.map(family => resolveFamily(family, styles)),
        settings: {
            outputDir,
            outputExtension: file.output.extension,
            cacheDir,
            reportPath: file.report.path
                ? resolve(baseDir, file.report.path)
                : join(outputDir, 'build-report.json'),
            concurrency: overrides.concurrency ?? file.build.concurrency,
            fetch: file.fetch,
            merge: {
                maxUnits: file.merge.maxUnits,
                policies: { ...DEFAULT_FIELD_POLICIES, ...file.merge.policies },
            },
        },
    };
    return deepFreeze(config);
}

/**
 * Read, validate and resolve a config file.
 *
 * @throws ConfigError when the file is missing, not JSON, or invalid
 */
export async function loadConfig(
    path: string,
    overrides?: ConfigOverrides,
    readFile: (path: string) => Promise<string> = p => fsReadFile(p, 'utf8'),
): Promise<BuildConfig> {
    const fullPath = resolve(path);
    let text: string;
    try {
        text = await readFile(fullPath);
    } catch (err) {
        throw new ConfigError(`Cannot read config file ${fullPath}: ${errorMessage(err)}`, [], { cause: err });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new ConfigError(`Config file ${fullPath} is not valid JSON: ${errorMessage(err)}`, [], { cause: err });
    }

    return parseConfig(raw, { baseDir: dirname(fullPath), overrides, readFile });
}

/** Split repeated/comma-separated filter values (`--family A,B --family C`). */
export function parseFilter(values: readonly string[] | undefined): string[] | undefined {
    if (!values || values.length === 0) return undefined;
    return values.flatMap(value => parseList(value));
}
