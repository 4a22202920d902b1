// tests/delivery.test.ts — Tests for output naming and delivery
import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { deliver } from '../src/lib/delivery.js';
import type { Deliverable } from '../src/lib/delivery.js';
import { DeliveryError, MergeError } from '../src/lib/errors.js';
import type { BuildTarget } from '../src/lib/graph.js';
import { canonicalFileName, familyNames, stripAxisTags } from '../src/lib/naming.js';
import type { StepResult } from '../src/lib/scheduler.js';
import { silentLogger, tempDir } from './fixtures.js';

describe('familyNames', () => {
    it('derives name records for a style', () => {
        expect(familyNames('Fold HK', 'Bold')).toEqual({
            family: 'Fold HK',
            subfamily: 'Bold',
            fullName: 'Fold HK Bold',
            postScriptName: 'FoldHK-Bold',
            typographicFamily: 'Fold HK',
            typographicSubfamily: 'Bold',
        });
    });

    it('leaves Regular out of the full name', () => {
        expect(familyNames('Fold HK', 'Regular')).toMatchObject({
            fullName: 'Fold HK',
            postScriptName: 'FoldHK-Regular',
        });
    });
});

describe('canonicalFileName', () => {
    it('joins slug, style and extension', () => {
        expect(canonicalFileName('FoldHK', 'Bold', 'ttf')).toBe('FoldHK-Bold.ttf');
    });
});

describe('stripAxisTags', () => {
    it('drops axis tags, style suffix and directories', () => {
        expect(stripAxisTags('NotoSans[wdth,wght].ttf')).toBe('NotoSans');
        expect(stripAxisTags('fonts/NotoSansSymbols2-Regular.ttf')).toBe('NotoSansSymbols2');
        expect(stripAxisTags('Plain.json')).toBe('Plain');
    });
});

// ─── deliver ────────────────────────────────────────────────────────

function target(id: string, deliverable = true): BuildTarget {
    return {
        id,
        kind: 'family',
        family: { name: 'F', slug: 'F', folders: [], styles: [] },
        style: { name: 'Regular', axes: {} },
        deliver: deliverable,
        dependsOn: [],
        contributions: [],
        inheritsBase: false,
    };
}

function succeeded(fileName: string, content: string): StepResult<Deliverable> {
    return {
        status: 'succeeded',
        value: { fileName, bytes: new TextEncoder().encode(content) },
        durationMs: 1,
    };
}

describe('deliver', () => {
    it('writes successful targets and skips failed ones', async () => {
        const outputDir = join(await tempDir(), 'out', 'fonts');
        const error = new MergeError('cannot merge');
        const results = new Map<string, StepResult<Deliverable>>([
            ['F-Regular', succeeded('F-Regular.json', 'regular')],
            ['F-Bold', { status: 'failed', error, durationMs: 1, ran: true }],
            ['Base-Regular', succeeded('Base-Regular.json', 'base')],
        ]);

        const report = await deliver(
            [target('Base-Regular', false), target('F-Regular'), target('F-Bold')],
            results,
            { outputDir, logger: silentLogger },
        );

        expect(report.written).toEqual([{ targetId: 'F-Regular', path: join(outputDir, 'F-Regular.json') }]);
        expect(report.skipped).toEqual([{ targetId: 'F-Bold', error }]);
        expect(report.failed).toEqual([]);
        expect(await readdir(outputDir)).toEqual(['F-Regular.json']);
        expect(await readFile(join(outputDir, 'F-Regular.json'), 'utf8')).toBe('regular');
    });

    it('replaces files of the same name', async () => {
        const outputDir = await tempDir();
        await writeFile(join(outputDir, 'F-Regular.json'), 'stale');

        await deliver([target('F-Regular')], new Map([['F-Regular', succeeded('F-Regular.json', 'fresh')]]), {
            outputDir,
            logger: silentLogger,
        });

        expect(await readFile(join(outputDir, 'F-Regular.json'), 'utf8')).toBe('fresh');
        expect(await readdir(outputDir)).toEqual(['F-Regular.json']);
    });

    it('reports write failures per target', async () => {
        const dir = await tempDir();
        const outputDir = join(dir, 'not-a-directory');
        await writeFile(outputDir, 'file');

        const report = await deliver([target('F-Regular')], new Map([['F-Regular', succeeded('F-Regular.json', 'x')]]), {
            outputDir,
            logger: silentLogger,
        });

        expect(report.written).toEqual([]);
        expect(report.failed).toHaveLength(1);
        expect(report.failed[0].error).toBeInstanceOf(DeliveryError);
        expect(report.failed[0].error.path).toBe(join(outputDir, 'F-Regular.json'));
    });
});
