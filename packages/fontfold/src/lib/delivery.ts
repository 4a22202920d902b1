// fontfold/src/lib/delivery.ts
// Delivery — completed target artifacts → output directory.

import { randomUUID } from 'node:crypto';
import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DeliveryError, errorMessage, InternalError } from './errors.js';
import type { BuildError } from './errors.js';
import type { BuildTarget } from './graph.js';
import type { Logger } from './logger.js';
import type { StepResult } from './scheduler.js';

export interface Deliverable {
    readonly bytes: Uint8Array;
    readonly fileName: string;
}

export interface DeliveryReport {
    readonly written: ReadonlyArray<{ readonly targetId: string; readonly path: string }>;
    /** Deliverable targets that did not build. */
    readonly skipped: ReadonlyArray<{ readonly targetId: string; readonly error: BuildError }>;
    readonly failed: ReadonlyArray<{ readonly targetId: string; readonly error: DeliveryError }>;
}

export interface DeliveryOptions {
    outputDir: string;
    logger: Logger;
}

async function writeAtomic(path: string, bytes: Uint8Array): Promise<void> {
    const tempPath = `${path}.${randomUUID()}.tmp`;
    try {
        await writeFile(tempPath, bytes);
        await rename(tempPath, path);
    } catch (err) {
        await unlink(tempPath).catch((cleanupErr: unknown) => {
            if (!(cleanupErr instanceof Error && 'code' in cleanupErr && cleanupErr.code === 'ENOENT')) {
                throw cleanupErr;
            }
        });
        throw err;
    }
}

/**
 * Write every successful deliverable target to `outputDir`, replacing
 * files of the same name. Failed targets are reported as skipped; a write
 * failure affects only its own target.
 */
export async function deliver(
    targets: readonly BuildTarget[],
    results: ReadonlyMap<string, StepResult<Deliverable>>,
    options: DeliveryOptions,
): Promise<DeliveryReport> {
    const { outputDir, logger } = options;
    const written: Array<{ targetId: string; path: string }> = [];
    const skipped: Array<{ targetId: string; error: BuildError }> = [];
    const failed: Array<{ targetId: string; error: DeliveryError }> = [];

    let dirError: unknown;
    try {
        await mkdir(outputDir, { recursive: true });
    } catch (err) {
        dirError = err;
    }

    for (const target of targets) {
        if (!target.deliver) continue;

        const result = results.get(target.id);
        if (!result) {
            skipped.push({ targetId: target.id, error: new InternalError(`No result for "${target.id}"`) });
            continue;
        }
        if (result.status === 'failed') {
            skipped.push({ targetId: target.id, error: result.error });
            logger.warn('Skipped', { target: target.id, kind: result.error.kind });
            continue;
        }

        const path = join(outputDir, result.value.fileName);
        try {
            if (dirError !== undefined) throw dirError;
            await writeAtomic(path, result.value.bytes);
            written.push({ targetId: target.id, path });
            logger.info('Delivered', { target: target.id, path });
        } catch (err) {
            const error = new DeliveryError(`Cannot write ${path}: ${errorMessage(err)}`, path, { cause: err });
            failed.push({ targetId: target.id, error });
            logger.error('Delivery failed', error, { target: target.id });
        }
    }

    return { written, skipped, failed };
}
