/**
 * Save Executor
 *
 * Resolves a save request into a scene and writes it to disk, replacing the
 * target file only once the new text is fully written.
 */

import * as fs from 'node:fs';
import type { World } from '../core/world';
import type { TypeRegistry } from './registry';
import type { Request, SaveCallbacks, SaveMode } from './request';
import { describeRequest } from './request';
import { extractScene } from './scene';
import { serializeScene } from './codec';
import { Persist } from './markers';
import { ioError } from './errors';

export type SaveRequest = Extract<Request, { kind: 'save' }>;

/**
 * Entities a save captures: Persist carriers, or everything for a dump.
 */
export function selectEntities(world: World, mode: SaveMode): number[] {
    return mode === 'dump'
        ? world.getAllEntityIds()
        : world.query(Persist).toArray();
}

/**
 * Write `text` to a sibling temp file, then rename it over `path`.
 * On failure the temp file is removed and `path` is left as it was.
 */
export function writeSceneFile(path: string, text: string): void {
    const tmp = `${path}.${process.pid}.tmp`;

    try {
        fs.writeFileSync(tmp, text, 'utf-8');
    } catch (error) {
        removeTempFile(tmp);
        throw ioError('Writing', tmp, error);
    }

    try {
        fs.renameSync(tmp, path);
    } catch (error) {
        removeTempFile(tmp);
        throw ioError('Replacing', path, error);
    }
}

function removeTempFile(tmp: string): void {
    try {
        fs.rmSync(tmp, { force: true });
    } catch (cleanupError) {
        console.warn(`[save] could not remove temporary file '${tmp}':`, cleanupError);
    }
}

export class SaveExecutor {
    constructor(
        private world: World,
        private registry: TypeRegistry,
        private callbacks: SaveCallbacks = {}
    ) {}

    /**
     * Run a save request to completion. Never throws and never modifies the
     * world; failures are logged and reported through onError.
     */
    run(request: SaveRequest): boolean {
        try {
            const entities = selectEntities(this.world, request.mode);
            const scene = extractScene(this.world, this.registry, entities);
            const text = serializeScene(scene);
            writeSceneFile(request.path, text);

            const count = scene.entities.length;
            console.info(`[save] ${describeRequest(request)}: wrote ${count} entities`);
            this.callbacks.onSave?.(request.path, count);
            return true;
        } catch (error) {
            console.error(`[save] ${describeRequest(request)} failed:`, error);
            this.callbacks.onError?.(request, error);
            return false;
        }
    }
}
