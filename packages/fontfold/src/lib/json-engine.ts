// fontfold/src/lib/json-engine.ts
// Artifact Engine over JSON glyph-set documents.
//
// Document shape:
//   {
//     "format": "fontfold-glyphs", "version": 1,
//     "axes": [{ "tag": "wght", "min": 100, "max": 900, "default": 400 }],
//     "location": {}, "globals": {}, "structural": {},
//     "units": [{ "codepoint": 65, "glyph": "A", "advance": 600, "lsb": 40,
//                 "variations": { "wght": 0.25 } }]
//   }
//
// Encoding is canonical (sorted keys, units by codepoint), so two artifacts
// with the same logical content serialise to the same bytes.

import { z } from 'zod';
import type { ArtifactEngine, AxisRange, FontArtifact, UnitData } from './artifact.js';
import { canonicalJson } from './helpers.js';

export const GLYPHS_FORMAT = 'fontfold-glyphs';

const UnitSchema = z.object({
    codepoint: z.number().int().min(0).max(0x10ffff),
    glyph: z.string(),
    advance: z.number(),
    lsb: z.number(),
    variations: z.record(z.string(), z.number()).optional(),
}).strict();

const AxisSchema = z.object({
    tag: z.string().min(1),
    min: z.number(),
    max: z.number(),
    default: z.number(),
}).strict().refine(axis => axis.min <= axis.default && axis.default <= axis.max, {
    message: 'Axis default must lie within [min, max]',
});

const DocumentSchema = z.object({
    format: z.literal(GLYPHS_FORMAT),
    version: z.literal(1),
    axes: z.array(AxisSchema).default([]),
    location: z.record(z.string(), z.number()).default({}),
    globals: z.record(z.string(), z.unknown()).default({}),
    structural: z.record(z.string(), z.unknown()).default({}),
    units: z.array(UnitSchema),
}).strict();

export type GlyphsDocument = z.input<typeof DocumentSchema>;

// ─── Helpers ────────────────────────────────────────────────────────

/** Requested value when inside the axis range, otherwise the axis default. */
export function resolveAxisValue(axis: AxisRange, requested: number | undefined): number {
    if (requested === undefined || requested < axis.min || requested > axis.max) {
        return axis.default;
    }
    return requested;
}

function instantiateUnit(
    unit: UnitData,
    axes: readonly AxisRange[],
    location: Readonly<Record<string, number>>,
): UnitData {
    let advance = unit.advance;
    for (const axis of axes) {
        const delta = unit.variations?.[axis.tag];
        if (delta !== undefined) {
            advance += delta * (location[axis.tag] - axis.default);
        }
    }
    return { glyph: unit.glyph, advance: Math.round(advance), lsb: unit.lsb };
}

/** Build an artifact from plain data; mainly for tests and fixtures. */
export function createArtifact(data: {
    units?: Iterable<readonly [number, UnitData]>;
    axes?: readonly AxisRange[];
    location?: Readonly<Record<string, number>>;
    globals?: Readonly<Record<string, unknown>>;
    structural?: Readonly<Record<string, unknown>>;
}): FontArtifact {
    return {
        axes: data.axes ?? [],
        location: data.location ?? {},
        units: new Map(data.units ?? []),
        globals: data.globals ?? {},
        structural: data.structural ?? {},
    };
}

// ─── Engine ─────────────────────────────────────────────────────────

export class JsonGlyphEngine implements ArtifactEngine {
    readonly extension = 'json';

    private readonly encoder = new TextEncoder();
    private readonly decoder = new TextDecoder('utf-8', { fatal: true });

    decode(bytes: Uint8Array, label: string): FontArtifact {
        let raw: unknown;
        try {
            raw = JSON.parse(this.decoder.decode(bytes));
        } catch (err) {
            throw new Error(`${label}: not a JSON document`, { cause: err });
        }

        const parsed = DocumentSchema.safeParse(raw);
        if (!parsed.success) {
            const first = parsed.error.issues[0];
            throw new Error(`${label}: invalid glyph document at ${first.path.join('.') || '(root)'}: ${first.message}`);
        }

        const units = new Map<number, UnitData>();
        for (const { codepoint, ...unit } of parsed.data.units) {
            if (units.has(codepoint)) {
                throw new Error(`${label}: duplicate codepoint ${codepoint}`);
            }
            units.set(codepoint, unit);
        }

        return {
            axes: parsed.data.axes,
            location: parsed.data.location,
            units,
            globals: parsed.data.globals,
            structural: parsed.data.structural,
        };
    }

    encode(artifact: FontArtifact): Uint8Array {
        const units = [...artifact.units.entries()]
            .sort(([a], [b]) => a - b)
            .map(([codepoint, unit]) => ({ codepoint, ...unit }));
        const document: GlyphsDocument = {
            format: GLYPHS_FORMAT,
            version: 1,
            axes: [...artifact.axes],
            location: artifact.location,
            globals: artifact.globals,
            structural: artifact.structural,
            units,
        };
        return this.encoder.encode(canonicalJson(document));
    }

    empty(): FontArtifact {
        return createArtifact({});
    }

    instantiate(artifact: FontArtifact, axes: Readonly<Record<string, number>>): FontArtifact {
        // Static sources pass through
        if (artifact.axes.length === 0) return artifact;

        const location: Record<string, number> = {};
        for (const axis of artifact.axes) {
            location[axis.tag] = resolveAxisValue(axis, axes[axis.tag]);
        }

        const units = new Map<number, UnitData>();
        for (const [codepoint, unit] of artifact.units) {
            units.set(codepoint, instantiateUnit(unit, artifact.axes, location));
        }

        return { ...artifact, axes: [], location, units };
    }

    subset(artifact: FontArtifact, reference: FontArtifact): FontArtifact {
        const units = new Map<number, UnitData>();
        for (const [codepoint, unit] of artifact.units) {
            if (reference.units.has(codepoint)) units.set(codepoint, unit);
        }
        return { ...artifact, units };
    }

    mergeUnits(acc: FontArtifact, source: FontArtifact, eligible: readonly number[]): FontArtifact {
        const units = new Map(acc.units);
        for (const codepoint of eligible) {
            const unit = source.units.get(codepoint);
            if (unit === undefined) {
                throw new Error(`Unit ${codepoint} is not defined by the source artifact`);
            }
            if (!units.has(codepoint)) units.set(codepoint, unit);
        }
        return { ...acc, units };
    }

    inheritGlobalTables(acc: FontArtifact, base: FontArtifact): FontArtifact {
        return { ...acc, structural: base.structural };
    }

    withGlobals(acc: FontArtifact, globals: Readonly<Record<string, unknown>>): FontArtifact {
        return { ...acc, globals };
    }
}
