/**
 * ECS World
 *
 * Main entry point for the entity store. Manages:
 * - Entity spawning/despawning (generational ids)
 * - Per-world component storage
 * - Containment hierarchy (parent/children)
 * - Query engine
 * - System scheduler and the per-tick phase order
 * - Plugins
 */

import { EntityIdAllocator, entityIndex, formatEntity } from './entity-id';
import {
    type ComponentType,
    type ComponentStorage,
    type ComponentValues,
    createComponentStorage,
    generateAccessorFactory,
    hasComponent,
    addComponentToEntity,
    removeComponentFromEntity,
    initializeComponentDefaults,
    readValues,
    writeValues
} from './component';
import { QueryEngine, QueryIterator } from './query';
import { SystemScheduler, type SystemFn, type SystemOptions } from './system';
import { MAX_ENTITIES, NULL_ENTITY } from './constants';

export interface WorldConfig {
    /** Capacity of component storage (default: MAX_ENTITIES) */
    maxEntities?: number;
}

interface StorageEntry {
    type: ComponentType;
    storage: ComponentStorage;
    accessor: (index: number) => ComponentValues;
}

/**
 * Entity builder returned by World.spawnWith().
 *
 * @example
 * const pawn = world.spawnWith()
 *     .with(Position, { x: 4, y: 7 })
 *     .with(Persist)
 *     .id;
 */
export class EntityBuilder {
    constructor(
        private world: World,
        readonly id: number
    ) {}

    /**
     * Attach a component (optionally overriding defaults).
     */
    with<T extends object>(component: ComponentType<T>, values?: Partial<T>): EntityBuilder {
        this.world.add(this.id, component, values);
        return this;
    }

    /**
     * Make this entity a child of `parent`.
     */
    childOf(parent: number): EntityBuilder {
        this.world.setParent(this.id, parent);
        return this;
    }
}

/**
 * ECS World - main container for all entity state.
 */
export class World {
    /** Entity ID allocator */
    readonly idAllocator: EntityIdAllocator;

    /** Query engine */
    readonly queryEngine: QueryEngine;

    /** System scheduler */
    readonly scheduler: SystemScheduler;

    /** Current frame number (incremented by tick) */
    frame: number = 0;

    /** Component storage by component name */
    private storages: Map<string, StorageEntry> = new Map();

    /** Active entity eids */
    private activeEntities: Set<number> = new Set();

    /** Entity components by eid (attachment order) */
    private entityComponents: Map<number, ComponentType[]> = new Map();

    /** Containment: child -> parent */
    private parents: Map<number, number> = new Map();

    /** Containment: parent -> children */
    private children: Map<number, number[]> = new Map();

    /** Installed plugins by class name */
    private plugins: Map<string, unknown> = new Map();

    private readonly capacity: number;

    constructor(config: WorldConfig = {}) {
        this.capacity = config.maxEntities ?? MAX_ENTITIES;
        this.idAllocator = new EntityIdAllocator(this.capacity);
        this.queryEngine = new QueryEngine((eid) => this.isDestroyed(eid));
        this.scheduler = new SystemScheduler();
    }

    // ==========================================
    // Entity Spawning/Destruction
    // ==========================================

    /**
     * Spawn a new entity with no components.
     */
    spawn(): number {
        const eid = this.idAllocator.allocate();
        this.activeEntities.add(eid);
        this.entityComponents.set(eid, []);
        return eid;
    }

    /**
     * Spawn a new entity and attach components fluently.
     */
    spawnWith(): EntityBuilder {
        return new EntityBuilder(this, this.spawn());
    }

    /**
     * Despawn a single entity. Its children are detached and become roots.
     * Returns false if the entity was already gone.
     */
    despawn(eid: number): boolean {
        if (!this.activeEntities.has(eid)) {
            return false; // Already destroyed
        }

        const components = this.entityComponents.get(eid) ?? [];
        const index = entityIndex(eid);

        // Remove from component storage
        for (const component of components) {
            const entry = this.storages.get(component.name);
            if (entry) removeComponentFromEntity(entry.storage, index);
        }

        // Remove from query engine
        this.queryEngine.removeEntity(eid, components);

        // Unlink hierarchy
        this.detach(eid);
        for (const child of this.children.get(eid) ?? []) {
            this.parents.delete(child);
        }
        this.children.delete(eid);

        // Clean up tracking
        this.activeEntities.delete(eid);
        this.entityComponents.delete(eid);

        this.idAllocator.free(eid);
        return true;
    }

    /**
     * Despawn an entity and all of its descendants.
     * A no-op (returns false) if the entity is already gone, e.g. because an
     * ancestor was despawned recursively first.
     */
    despawnRecursive(eid: number): boolean {
        if (!this.activeEntities.has(eid)) {
            return false;
        }
        for (const child of this.getChildren(eid)) {
            this.despawnRecursive(child);
        }
        return this.despawn(eid);
    }

    /**
     * Check if entity is alive (spawned and not despawned).
     */
    isAlive(eid: number): boolean {
        return this.activeEntities.has(eid);
    }

    /**
     * Check if entity is destroyed.
     */
    isDestroyed(eid: number): boolean {
        return !this.activeEntities.has(eid);
    }

    /**
     * Get all active entity IDs, in spawn order.
     */
    getAllEntityIds(): number[] {
        return Array.from(this.activeEntities);
    }

    /**
     * Get entity count.
     */
    get entityCount(): number {
        return this.activeEntities.size;
    }

    // ==========================================
    // Component API
    // ==========================================

    /**
     * Attach a component, or overwrite it if already attached.
     * Fields not given in `values` take the schema defaults.
     * Returns a live accessor.
     */
    add<T extends object>(eid: number, component: ComponentType<T>, values?: Partial<T>): T {
        this.assertAlive(eid);
        const entry = this.storageFor(component);
        const index = entityIndex(eid);

        if (!hasComponent(entry.storage, index)) {
            addComponentToEntity(entry.storage, index);
            this.entityComponents.get(eid)?.push(component);
            this.queryEngine.addComponent(eid, component);
        }
        initializeComponentDefaults(entry.storage, index);
        if (values) {
            writeValues(entry.storage, component.name, index, values);
        }

        return entry.accessor(index) as T;
    }

    /**
     * Detach a component. Returns false if it was not attached.
     */
    remove(eid: number, component: ComponentType): boolean {
        if (!this.has(eid, component)) return false;

        const entry = this.storages.get(component.name);
        if (entry) removeComponentFromEntity(entry.storage, entityIndex(eid));

        const list = this.entityComponents.get(eid);
        if (list) {
            const at = list.findIndex(c => c.name === component.name);
            if (at !== -1) list.splice(at, 1);
        }
        this.queryEngine.removeComponent(eid, component);
        return true;
    }

    /**
     * Check whether a live entity has a component.
     */
    has(eid: number, component: ComponentType): boolean {
        if (!this.activeEntities.has(eid)) return false;
        const entry = this.storages.get(component.name);
        return entry !== undefined && hasComponent(entry.storage, entityIndex(eid));
    }

    /**
     * Live accessor for a component; writes go to storage.
     * Returns null if the entity is gone or lacks the component.
     */
    get<T extends object>(eid: number, component: ComponentType<T>): T | null {
        const view = this.view(eid, component);
        return view ? view as T : null;
    }

    /**
     * Untyped live accessor, for code driven by the schema rather than by T.
     */
    view(eid: number, component: ComponentType): ComponentValues | null {
        if (!this.has(eid, component)) return null;
        return this.storageFor(component).accessor(entityIndex(eid));
    }

    /**
     * Detached copy of a component's values, or null.
     */
    read(eid: number, component: ComponentType): ComponentValues | null {
        if (!this.has(eid, component)) return null;
        const entry = this.storageFor(component);
        return readValues(entry.storage, entityIndex(eid));
    }

    /**
     * Component types attached to an entity, in attachment order.
     */
    getComponents(eid: number): ComponentType[] {
        return [...(this.entityComponents.get(eid) ?? [])];
    }

    // ==========================================
    // Queries
    // ==========================================

    /**
     * Entities having ALL of the given components.
     */
    query(...components: ComponentType[]): QueryIterator {
        return this.queryEngine.byComponents(...components);
    }

    /**
     * Entities having ANY of the given components.
     */
    queryAny(...components: ComponentType[]): QueryIterator {
        return this.queryEngine.byAnyComponent(...components);
    }

    // ==========================================
    // Hierarchy
    // ==========================================

    /**
     * Set (or clear, with NULL_ENTITY) the parent of an entity.
     */
    setParent(child: number, parent: number): void {
        this.assertAlive(child);
        this.detach(child);
        if (parent === NULL_ENTITY) return;

        this.assertAlive(parent);
        for (let p: number | undefined = parent; p !== undefined; p = this.parents.get(p)) {
            if (p === child) {
                throw new Error(`Cannot parent ${formatEntity(child)} under its own descendant ${formatEntity(parent)}`);
            }
        }

        this.parents.set(child, parent);
        let list = this.children.get(parent);
        if (!list) {
            list = [];
            this.children.set(parent, list);
        }
        list.push(child);
    }

    /**
     * Parent of an entity, or NULL_ENTITY.
     */
    getParent(eid: number): number {
        return this.parents.get(eid) ?? NULL_ENTITY;
    }

    /**
     * Direct children of an entity (copy).
     */
    getChildren(eid: number): number[] {
        return [...(this.children.get(eid) ?? [])];
    }

    // ==========================================
    // Systems & Plugins
    // ==========================================

    /**
     * Add a system.
     */
    addSystem(fn: SystemFn, options?: SystemOptions): () => void {
        return this.scheduler.add(fn, options);
    }

    /**
     * Install a plugin. The plugin constructor receives this world first.
     *
     * @example
     * const saves = world.addPlugin(SavePlugin, { debug: true });
     */
    addPlugin<T, A extends unknown[]>(
        Plugin: new (world: World, ...args: A) => T,
        ...args: A
    ): T {
        const plugin = new Plugin(this, ...args);
        this.plugins.set(Plugin.name || 'anonymous', plugin);
        return plugin;
    }

    /**
     * Get a previously added plugin by class.
     */
    getPlugin<T>(Plugin: abstract new (...args: never[]) => T): T | undefined {
        const plugin = this.plugins.get(Plugin.name);
        return plugin instanceof Plugin ? plugin : undefined;
    }

    /**
     * Run a single tick: every phase of SYSTEM_PHASES, in order.
     */
    tick(): void {
        this.frame++;
        this.scheduler.runAll();
    }

    // ==========================================
    // Internals
    // ==========================================

    private storageFor(component: ComponentType): StorageEntry {
        const existing = this.storages.get(component.name);
        if (existing) {
            if (existing.type !== component) {
                throw new Error(`Component name '${component.name}' is used by two different definitions`);
            }
            return existing;
        }

        const storage = createComponentStorage(component.schema, this.capacity);
        const entry: StorageEntry = {
            type: component,
            storage,
            accessor: generateAccessorFactory(storage)
        };
        this.storages.set(component.name, entry);
        return entry;
    }

    private detach(child: number): void {
        const parent = this.parents.get(child);
        if (parent === undefined) return;
        this.parents.delete(child);
        const list = this.children.get(parent);
        if (!list) return;
        const at = list.indexOf(child);
        if (at !== -1) list.splice(at, 1);
        if (list.length === 0) this.children.delete(parent);
    }

    private assertAlive(eid: number): void {
        if (!this.activeEntities.has(eid)) {
            throw new Error(`Entity ${formatEntity(eid)} is not alive`);
        }
    }
}
