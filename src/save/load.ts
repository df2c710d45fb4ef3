/**
 * Load Executor
 *
 * Replaces every Persist/Unload entity of the world with the entities of a
 * scene file, then keeps the old index -> new entity mapping alive until
 * the end of the postLoad phase so references can be fixed up.
 *
 * State flow (default):          idle -> unloading -> reading -> applying -> awaitingFixup -> idle
 * State flow (readBeforeUnload): idle -> reading -> unloading -> applying -> awaitingFixup -> idle
 *
 * A failure at any step returns to idle. In the default order the world has
 * already been unloaded when a bad file is detected.
 */

import * as fs from 'node:fs';
import { formatEntity } from '../core/entity-id';
import type { World } from '../core/world';
import type { TypeRegistry } from './registry';
import type { FixupRegistry } from './fixup';
import { Loaded } from './fixup';
import type { Request, SaveCallbacks } from './request';
import { describeRequest } from './request';
import type { Scene } from './scene';
import { despawnAll, writeSceneToWorld } from './scene';
import { deserializeScene } from './codec';
import { Persist, Restored, Unload } from './markers';
import { ioError } from './errors';

export type LoadRequest = Extract<Request, { kind: 'load' }>;

export type LoadState = 'idle' | 'unloading' | 'reading' | 'applying' | 'awaitingFixup';

export interface LoadExecutorOptions {
    /** Log each re-created entity */
    debug?: boolean;
    /** Parse the file before unloading, so a bad file leaves the world intact */
    readBeforeUnload?: boolean;
    callbacks?: SaveCallbacks;
}

/**
 * Despawn, recursively, every entity carrying Persist or Unload.
 * Returns how many entities left the world.
 */
export function unloadWorld(world: World): number {
    const before = world.entityCount;
    for (const eid of world.queryAny(Persist, Unload)) {
        // Skipped by the iterator once an ancestor took it down
        world.despawnRecursive(eid);
    }
    return before - world.entityCount;
}

/**
 * Read and decode a scene file.
 */
export function readSceneFile(path: string, registry: TypeRegistry): Scene {
    let text: string;
    try {
        text = fs.readFileSync(path, 'utf-8');
    } catch (error) {
        throw ioError('Reading', path, error);
    }
    return deserializeScene(text, registry);
}

/**
 * Insert a scene into the world. Every new entity gets Persist and a
 * Restored tag carrying its saved index. Nothing is left behind on failure.
 */
export function applyScene(world: World, scene: Scene): Loaded {
    const spawned = writeSceneToWorld(world, scene);
    try {
        for (const [index, eid] of spawned) {
            world.add(eid, Persist);
            world.add(eid, Restored, { index });
        }
    } catch (error) {
        despawnAll(world, spawned.values());
        throw error;
    }
    return new Loaded(spawned);
}

/**
 * Drop the Restored tag from every entity still carrying it.
 */
export function clearRestored(world: World): void {
    for (const eid of world.query(Restored)) {
        world.remove(eid, Restored);
    }
}

export class LoadExecutor {
    private _state: LoadState = 'idle';
    private _loaded: Loaded | null = null;
    private path: string = '';

    private readonly debug: boolean;
    private readonly readBeforeUnload: boolean;
    private readonly callbacks: SaveCallbacks;

    constructor(
        private world: World,
        private registry: TypeRegistry,
        private fixups: FixupRegistry,
        options: LoadExecutorOptions = {}
    ) {
        this.debug = options.debug ?? false;
        this.readBeforeUnload = options.readBeforeUnload ?? false;
        this.callbacks = options.callbacks ?? {};
    }

    get state(): LoadState {
        return this._state;
    }

    /**
     * Mapping of the load in progress; null outside load..postLoad.
     */
    get loaded(): Loaded | null {
        return this._loaded;
    }

    /**
     * Unload, read and apply. Never throws; returns false on failure.
     */
    run(request: LoadRequest): boolean {
        let loaded: Loaded;
        try {
            let scene: Scene;
            if (this.readBeforeUnload) {
                scene = this.read(request.path);
                this.unload();
            } else {
                this.unload();
                scene = this.read(request.path);
            }

            this._state = 'applying';
            loaded = applyScene(this.world, scene);
        } catch (error) {
            clearRestored(this.world);
            this._loaded = null;
            this._state = 'idle';
            console.error(`[load] ${describeRequest(request)} failed:`, error);
            this.callbacks.onError?.(request, error);
            return false;
        }

        if (this.debug) {
            for (const [index, eid] of loaded.entries()) {
                console.debug(`[load] entity ${index} -> ${formatEntity(eid)}`);
            }
        }
        console.info(`[load] ${describeRequest(request)}: spawned ${loaded.size} entities`);

        this._loaded = loaded;
        this.path = request.path;
        this._state = 'awaitingFixup';
        return true;
    }

    /**
     * Apply registered fix-ups. If one throws, the load is finished (the
     * mapping cannot be applied twice) and the error propagates.
     */
    fixup(): void {
        const loaded = this._loaded;
        if (!loaded) return;

        try {
            this.fixups.apply(this.world, loaded);
        } catch (error) {
            const request: LoadRequest = { kind: 'load', path: this.path };
            console.error(`[load] reference fix-up for ${describeRequest(request)} failed:`, error);
            this.reset();
            this.callbacks.onError?.(request, error);
            throw error;
        }
    }

    /**
     * End of postLoad: drop the Restored tags and the mapping.
     */
    finish(): void {
        const loaded = this._loaded;
        if (!loaded) return;

        this.reset();
        this.callbacks.onLoad?.(this.path, loaded.size);
    }

    /**
     * Drop a mapping left over from a postLoad phase that never completed.
     */
    discardStale(): void {
        if (!this._loaded) return;
        console.warn(`[load] discarding unfinished load of '${this.path}'`);
        this.reset();
    }

    private read(path: string): Scene {
        this._state = 'reading';
        return readSceneFile(path, this.registry);
    }

    private unload(): void {
        this._state = 'unloading';
        const removed = unloadWorld(this.world);
        if (this.debug) {
            console.debug(`[load] unloaded ${removed} entities`);
        }
    }

    private reset(): void {
        clearRestored(this.world);
        this._loaded = null;
        this._state = 'idle';
    }
}
