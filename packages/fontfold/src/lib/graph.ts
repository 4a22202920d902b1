// fontfold/src/lib/graph.ts
// Family Build Graph — targets, their contributions and build order.
//
// Per style: one shared base target (the base family) fanning out to one
// target per extension family. Family targets depend on their style's base
// target and on nothing else, so the graph is two levels deep.

import { flattenRanked, mkRank } from 'libfold';
import { ConfigError, InternalError } from './errors.js';
import { allFamilies, findFolder, findStyle } from './model.js';
import type { BuildConfig, Family, Folder, Source, Style } from './model.js';

export type TargetKind = 'base' | 'family';

/** Where one contribution of a target comes from. */
export type ContributionRef =
    | { readonly kind: 'source'; readonly folder: string; readonly source: Source }
    | { readonly kind: 'target'; readonly targetId: string };

export interface BuildTarget {
    /** `{FamilySlug}-{StyleName}` */
    readonly id: string;
    readonly kind: TargetKind;
    readonly family: Family;
    readonly style: Style;
    /** False for base targets planned only because a family extends them. */
    readonly deliver: boolean;
    readonly dependsOn: readonly string[];
    /** Merge order, highest priority first. */
    readonly contributions: readonly ContributionRef[];
    /** Whether the first contribution is the base artifact. */
    readonly inheritsBase: boolean;
}

export interface BuildPlan {
    /** Topological order: every target after the targets it depends on. */
    readonly targets: readonly BuildTarget[];
}

export interface PlanFilters {
    /** Family names or slugs; all families when absent. */
    families?: readonly string[];
    /** Style names; every style of each family when absent. */
    styles?: readonly string[];
}

export function targetId(family: Family, style: Style | string): string {
    return `${family.slug}-${typeof style === 'string' ? style : style.name}`;
}

// ─── Contributions ──────────────────────────────────────────────────

function resolveFolders(config: BuildConfig, ids: readonly string[]): Folder[] {
    return ids.map(id => {
        const folder = findFolder(config, id);
        if (!folder) throw new InternalError(`Unknown folder "${id}"`);
        return folder;
    });
}

/**
 * Sources of the given folders in merge order: rank first, declared source
 * order inside a folder. Folders sharing a rank keep their listed order.
 */
export function orderedSources(
    config: BuildConfig,
    folderIds: readonly string[],
): Array<{ folder: string; source: Source }> {
    return flattenRanked(
        resolveFolders(config, folderIds).map(folder =>
            mkRank(folder.rank, folder.sources.map(source => ({ folder: folder.id, source }))),
        ),
    );
}

// ─── Filters ────────────────────────────────────────────────────────

function selectFamilies(config: BuildConfig, names: readonly string[] | undefined): Set<Family> {
    const families = allFamilies(config);
    if (!names) return new Set(families);

    const selected = new Set<Family>();
    const unknown: string[] = [];
    for (const name of names) {
        const family = families.find(f => f.name === name || f.slug === name);
        if (family) selected.add(family);
        else unknown.push(name);
    }
    if (unknown.length > 0) {
        throw new ConfigError(
            'Unknown family filter',
            unknown.map(name => `"${name}" (known: ${families.map(f => f.name).join(', ')})`),
        );
    }
    return selected;
}

function selectStyles(config: BuildConfig, names: readonly string[] | undefined): Set<string> {
    const known = config.styles.map(s => s.name);
    if (!names) return new Set(known);

    const unknown = names.filter(name => !known.includes(name));
    if (unknown.length > 0) {
        throw new ConfigError(
            'Unknown style filter',
            unknown.map(name => `"${name}" (known: ${known.join(', ')})`),
        );
    }
    return new Set(names);
}

// ─── Ordering ───────────────────────────────────────────────────────

/**
 * Kahn's algorithm. Ties keep the input order, so equal plans always come
 * out in the same order.
 */
export function topologicalOrder(targets: readonly BuildTarget[]): BuildTarget[] {
    const byId = new Map(targets.map(t => [t.id, t]));
    const indegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const target of targets) {
        indegree.set(target.id, target.dependsOn.length);
        for (const dep of target.dependsOn) {
            if (!byId.has(dep)) {
                throw new InternalError(`Target "${target.id}" depends on unplanned "${dep}"`);
            }
            dependents.set(dep, [...(dependents.get(dep) ?? []), target.id]);
        }
    }

    const queue = targets.filter(t => t.dependsOn.length === 0).map(t => t.id);
    const order: BuildTarget[] = [];
    while (queue.length > 0) {
        const id = queue.shift();
        const target = id === undefined ? undefined : byId.get(id);
        if (!target) break;
        order.push(target);
        for (const next of dependents.get(target.id) ?? []) {
            const remaining = (indegree.get(next) ?? 0) - 1;
            indegree.set(next, remaining);
            if (remaining === 0) queue.push(next);
        }
    }

    if (order.length !== targets.length) {
        throw new InternalError('Build graph contains a cycle');
    }
    return order;
}

// ─── Planning ───────────────────────────────────────────────────────

/**
 * Compute the targets to build and their order.
 *
 * A style's base target is planned whenever any family target of that
 * style is, and delivered only when the base family itself is selected.
 *
 * @throws ConfigError for unknown family or style filters
 */
export function plan(config: BuildConfig, filters: PlanFilters = {}): BuildPlan {
    const families = selectFamilies(config, filters.families);
    const styles = selectStyles(config, filters.styles);
    const base = config.baseFamily;
    const baseFolder = resolveFolders(config, base.folders)[0];
    const baseContributions: ContributionRef[] = orderedSources(config, base.folders)
        .map(({ folder, source }): ContributionRef => ({ kind: 'source', folder, source }));

    const familyTargets: BuildTarget[] = [];
    const neededBaseStyles = new Set<string>();

    for (const family of config.families) {
        if (!families.has(family)) continue;
        const extension = orderedSources(config, family.folders)
            .filter(({ source }) => !source.omitFrom.includes(family.name));

        for (const styleName of family.styles) {
            if (!styles.has(styleName)) continue;
            const style = findStyle(config, styleName);
            if (!style) throw new InternalError(`Unknown style "${styleName}"`);
            const baseId = targetId(base, style);
            neededBaseStyles.add(style.name);
            familyTargets.push({
                id: targetId(family, style),
                kind: 'family',
                family,
                style,
                deliver: true,
                dependsOn: [baseId],
                contributions: [
                    { kind: 'target', targetId: baseId },
                    ...extension.map(({ folder, source }): ContributionRef => ({ kind: 'source', folder, source })),
                ],
                inheritsBase: true,
            });
        }
    }

    const baseTargets: BuildTarget[] = [];
    for (const style of config.styles) {
        const deliver = families.has(base) && base.styles.includes(style.name) && styles.has(style.name);
        if (!deliver && !neededBaseStyles.has(style.name)) continue;
        baseTargets.push({
            id: targetId(base, style),
            kind: 'base',
            family: base,
            style,
            deliver,
            dependsOn: [],
            contributions: baseContributions,
            inheritsBase: baseFolder?.base ?? false,
        });
    }

    return { targets: topologicalOrder([...baseTargets, ...familyTargets]) };
}
