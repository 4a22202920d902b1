// fontfold/src/lib/artifact.ts
// Artifact Engine contract.
//
// The core never looks inside a font's binary container. It sees a logical
// artifact (units keyed by codepoint, global records, structural tables)
// and asks the engine for the few primitives the merge needs. Every
// primitive is pure: it returns a new artifact and leaves its inputs alone.

/** Per-unit data copied verbatim when a unit enters a merge. */
export interface UnitData {
    readonly glyph: string;
    readonly advance: number;
    readonly lsb: number;
    /** Axis tag → advance delta per axis unit away from the default. */
    readonly variations?: Readonly<Record<string, number>>;
}

export interface AxisRange {
    readonly tag: string;
    readonly min: number;
    readonly max: number;
    readonly default: number;
}

export interface FontArtifact {
    /** Variation axes; empty for a fixed (static) artifact. */
    readonly axes: readonly AxisRange[];
    /** Axis values this fixed artifact was instantiated at. */
    readonly location: Readonly<Record<string, number>>;
    readonly units: ReadonlyMap<number, UnitData>;
    /** Records merged field by field: naming, metrics bounds. */
    readonly globals: Readonly<Record<string, unknown>>;
    /** Shaping/layout tables; only ever inherited from the base artifact. */
    readonly structural: Readonly<Record<string, unknown>>;
}

export interface ArtifactEngine {
    /** File extension of encoded artifacts, without the dot. */
    readonly extension: string;

    /**
     * Parse encoded bytes.
     * @param label - Used in error messages
     * @throws Error when the bytes are not a readable artifact
     */
    decode(bytes: Uint8Array, label: string): FontArtifact;

    /** Serialise; equal logical content always gives equal bytes. */
    encode(artifact: FontArtifact): Uint8Array;

    empty(): FontArtifact;

    /**
     * Fix a parametric artifact at the given axis values.
     * @throws Error when the artifact cannot be instantiated
     */
    instantiate(artifact: FontArtifact, axes: Readonly<Record<string, number>>): FontArtifact;

    /** Keep only the units whose codepoint `reference` also defines; axes stay as they are. */
    subset(artifact: FontArtifact, reference: FontArtifact): FontArtifact;

    /** Copy the `eligible` units of `source` into `acc`. Existing units are never replaced. */
    mergeUnits(acc: FontArtifact, source: FontArtifact, eligible: readonly number[]): FontArtifact;

    /** Take the structural tables of `base`, replacing whatever `acc` had. */
    inheritGlobalTables(acc: FontArtifact, base: FontArtifact): FontArtifact;

    withGlobals(acc: FontArtifact, globals: Readonly<Record<string, unknown>>): FontArtifact;
}
