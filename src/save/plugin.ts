/**
 * SavePlugin - atomic scene save/load for a World
 *
 * Owns the request slot, the serializable type registry and the fix-up
 * table, and installs the executors on the world's scheduler:
 * - load      Load executor (unload, read, apply)
 * - postLoad  reference fix-ups, then finalization (last in the phase)
 * - save      Save executor
 *
 * @example
 * const saves = world.addPlugin(SavePlugin, { debug: true });
 *
 * saves.registerType(Position, Health);
 * saves.registerLoaded(CurrentWeapon);
 *
 * world.spawnWith().with(Position, { x: 4, y: 7 }).with(Persist);
 *
 * saves.save('world.json');
 * world.tick();             // written during the save phase
 *
 * saves.load('world.json');
 * world.tick();             // unloaded, reloaded and fixed up before 'first'
 */

import type { ComponentType } from '../core/component';
import type { World } from '../core/world';
import { TypeRegistry } from './registry';
import { FixupRegistry, type FixupFn, type Loaded } from './fixup';
import { RequestSlot, type SaveCallbacks } from './request';
import { SaveExecutor } from './save';
import { LoadExecutor, type LoadState } from './load';

export interface SavePluginOptions {
    /** Serializable types; pass one in to share it between worlds */
    registry?: TypeRegistry;

    /** Log every remapped entity */
    debug?: boolean;

    /**
     * Parse the file before unloading, so a missing or bad file leaves the
     * world untouched. Off by default: the world is unloaded first.
     */
    readBeforeUnload?: boolean;

    callbacks?: SaveCallbacks;
}

/** Fix-ups run before any application postLoad system. */
export const FIXUP_ORDER = -1000;

/** Finalization runs after every application postLoad system. */
export const FINISH_ORDER = 1000;

export class SavePlugin {
    readonly requests: RequestSlot = new RequestSlot();
    readonly registry: TypeRegistry;
    readonly fixups: FixupRegistry = new FixupRegistry();

    private saver: SaveExecutor;
    private loader: LoadExecutor;

    /** Removal functions of the installed systems */
    private uninstallers: Array<() => void> = [];

    constructor(private world: World, options: SavePluginOptions = {}) {
        this.registry = options.registry ?? new TypeRegistry();
        this.saver = new SaveExecutor(world, this.registry, options.callbacks);
        this.loader = new LoadExecutor(world, this.registry, this.fixups, {
            debug: options.debug,
            readBeforeUnload: options.readBeforeUnload,
            callbacks: options.callbacks
        });

        this.installSystems();
    }

    // ==========================================
    // Requests
    // ==========================================

    /**
     * Save every Persist entity to `path` at the end of the next tick.
     */
    save(path: string): void {
        this.requests.save(path);
    }

    /**
     * Save every live entity to `path` at the end of the next tick.
     */
    dump(path: string): void {
        this.requests.dump(path);
    }

    /**
     * Replace the Persist/Unload entities with the scene in `path` at the
     * start of the next tick.
     */
    load(path: string): void {
        this.requests.load(path);
    }

    // ==========================================
    // Registration
    // ==========================================

    /**
     * Mark component types as serializable.
     */
    registerType(...types: ComponentType[]): this {
        this.registry.register(...types);
        return this;
    }

    /**
     * Register a component type holding entity references. It becomes
     * serializable and its references are rewritten after every load,
     * either by `fixup` or by remapping each `entity` field.
     */
    registerLoaded<T extends object>(type: ComponentType<T>, fixup?: FixupFn<T>): this {
        this.registry.register(type);
        this.fixups.register(type, fixup);
        return this;
    }

    // ==========================================
    // State
    // ==========================================

    /**
     * Old index -> new entity mapping, available during postLoad only.
     */
    get loaded(): Loaded | null {
        return this.loader.loaded;
    }

    get state(): LoadState {
        return this.loader.state;
    }

    /**
     * Remove the plugin's systems from the world.
     */
    destroy(): void {
        for (const uninstall of this.uninstallers) uninstall();
        this.uninstallers = [];
        this.requests.clear();
    }

    // ==========================================
    // Systems
    // ==========================================

    private installSystems(): void {
        this.uninstallers.push(
            this.world.addSystem(() => this.loader.discardStale(), {
                phase: 'load',
                order: FIXUP_ORDER
            }),
            this.world.addSystem(() => this.runLoad(), {
                phase: 'load',
                runIf: () => this.requests.shouldLoad()
            }),
            this.world.addSystem(() => this.loader.fixup(), {
                phase: 'postLoad',
                order: FIXUP_ORDER,
                runIf: () => this.loader.loaded !== null
            }),
            this.world.addSystem(() => this.loader.finish(), {
                phase: 'postLoad',
                order: FINISH_ORDER,
                runIf: () => this.loader.loaded !== null
            }),
            this.world.addSystem(() => this.runSave(), {
                phase: 'save',
                runIf: () => this.requests.shouldSave()
            })
        );
    }

    private runLoad(): void {
        const request = this.requests.take();
        if (request?.kind === 'load') {
            this.loader.run(request);
        }
    }

    private runSave(): void {
        const request = this.requests.take();
        if (request?.kind === 'save') {
            this.saver.run(request);
        }
    }
}
