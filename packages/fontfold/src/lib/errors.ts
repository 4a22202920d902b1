// fontfold/src/lib/errors.ts
// Build error taxonomy.
//
// Errors are attached to the target (or, for configuration and base
// failures, to every dependent target) rather than thrown across the whole
// invocation. Each carries a `kind` discriminant and, where one is known,
// the identity of the offending source.

export type BuildErrorKind =
    | 'config'
    | 'fetch'
    | 'instantiation'
    | 'merge'
    | 'base-build'
    | 'delivery'
    | 'cancelled'
    | 'internal';

/** (repository, path) — the identity key of a source. */
export interface SourceIdentity {
    readonly repository: string;
    readonly path: string;
}

export interface BuildErrorOptions {
    cause?: unknown;
    source?: SourceIdentity;
}

export function describeSource(source: SourceIdentity): string {
    return `${source.repository}:${source.path}`;
}

export abstract class BuildError extends Error {
    abstract readonly kind: BuildErrorKind;
    readonly source?: SourceIdentity;

    constructor(message: string, options: BuildErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.source = options.source;
    }
}

/** Malformed or contradictory configuration. Fatal before any build step. */
export class ConfigError extends BuildError {
    readonly kind = 'config' as const;
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = [], options?: BuildErrorOptions) {
        super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, options);
        this.issues = issues;
    }
}

export class FetchError extends BuildError {
    readonly kind = 'fetch' as const;
    readonly transient: boolean;
    readonly status?: number;

    constructor(
        message: string,
        options: BuildErrorOptions & { transient: boolean; status?: number },
    ) {
        super(message, options);
        this.transient = options.transient;
        this.status = options.status;
    }
}

export class InstantiationError extends BuildError {
    readonly kind = 'instantiation' as const;
}

/** A contributing artifact is unreadable or cannot be merged. */
export class MergeError extends BuildError {
    readonly kind = 'merge' as const;
}

/** The shared base step failed; fatal to every target that extends it. */
export class BaseBuildError extends BuildError {
    readonly kind = 'base-build' as const;
}

export class DeliveryError extends BuildError {
    readonly kind = 'delivery' as const;
    readonly path: string;

    constructor(message: string, path: string, options?: BuildErrorOptions) {
        super(message, options);
        this.path = path;
    }
}

/** The invocation was aborted before or while the step ran. */
export class CancelledError extends BuildError {
    readonly kind = 'cancelled' as const;
}

/** Anything thrown that is not a BuildError. */
export class InternalError extends BuildError {
    readonly kind = 'internal' as const;
}

export function isBuildError(err: unknown): err is BuildError {
    return err instanceof BuildError;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Normalise a thrown value. BuildErrors pass through; anything else is
 * wrapped by `wrap` (default: InternalError) with the original as cause.
 */
export function toBuildError(
    err: unknown,
    wrap: (message: string, options: BuildErrorOptions) => BuildError =
        (message, options) => new InternalError(message, options),
    source?: SourceIdentity,
): BuildError {
    if (isBuildError(err)) return err;
    return wrap(errorMessage(err), { cause: err, source });
}
