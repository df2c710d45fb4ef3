/**
 * Reference fix-up
 *
 * Entity indices are not stable across a save/load boundary, and a loaded
 * entity never gets its old generation back. Any component that stores an
 * entity reference must be rewritten after a load, keyed on the index of
 * the old reference only.
 */

import { type ComponentType, entityFields } from '../core/component';
import { NULL_ENTITY } from '../core/constants';
import { entityIndex, formatEntity } from '../core/entity-id';
import type { World } from '../core/world';
import { Restored } from './markers';
import { SceneError } from './errors';

/**
 * Mapping from saved entity index to the entity that now holds its data.
 * Available during the postLoad phase that follows a load.
 */
export class Loaded {
    constructor(private readonly entities: ReadonlyMap<number, number>) {}

    /**
     * New entity for an old reference, or undefined if it was not loaded.
     */
    entity(old: number): number | undefined {
        if (old < 0) return undefined;
        return this.entities.get(entityIndex(old));
    }

    /**
     * New entity for an old reference. A reference to an entity that was not
     * part of the scene means the saved data is inconsistent: it throws.
     */
    map(old: number): number {
        const entity = this.entity(old);
        if (entity === undefined) {
            throw new SceneError(
                'ERR_MISSING_ENTITY',
                `Reference to entity ${old < 0 ? old : formatEntity(old)} cannot be resolved: it was not part of the loaded scene`
            );
        }
        return entity;
    }

    /**
     * Like map(), but NULL_ENTITY stays NULL_ENTITY.
     */
    mapOptional(old: number): number {
        return old === NULL_ENTITY ? NULL_ENTITY : this.map(old);
    }

    has(oldIndex: number): boolean {
        return this.entities.has(oldIndex);
    }

    get size(): number {
        return this.entities.size;
    }

    /**
     * [saved index, new entity] pairs.
     */
    entries(): IterableIterator<[number, number]> {
        return this.entities.entries();
    }
}

/**
 * Rewrites the references held by one component instance.
 *
 * @example
 * saves.registerLoaded(CurrentWeapon, (weapon, loaded) => {
 *     weapon.entity = loaded.mapOptional(weapon.entity);
 * });
 */
export type FixupFn<T> = (component: T, loaded: Loaded, entity: number) => void;

interface FixupEntry {
    type: ComponentType;
    apply: (world: World, loaded: Loaded) => void;
}

/**
 * Component type -> rewrite operation. Applied generically, in registration
 * order, to the components of entities tagged Restored.
 */
export class FixupRegistry {
    private fixups: Map<string, FixupEntry> = new Map();

    /**
     * Register a component type for fix-up. Without `fixup`, every `entity`
     * field of the component is rewritten with Loaded.mapOptional().
     */
    register<T extends object>(type: ComponentType<T>, fixup?: FixupFn<T>): void {
        if (this.fixups.has(type.name)) {
            throw new Error(`Fix-up for '${type.name}' is already registered`);
        }

        const apply = fixup
            ? (world: World, loaded: Loaded) => {
                for (const eid of world.query(Restored, type)) {
                    const component = world.get(eid, type);
                    if (component) fixup(component, loaded, eid);
                }
            }
            : (world: World, loaded: Loaded) => rewriteEntityFields(world, type, loaded);

        this.fixups.set(type.name, { type, apply });
    }

    has(type: ComponentType): boolean {
        return this.fixups.get(type.name)?.type === type;
    }

    /**
     * Run every registered fix-up.
     */
    apply(world: World, loaded: Loaded): void {
        for (const entry of this.fixups.values()) {
            entry.apply(world, loaded);
        }
    }
}

/**
 * Schema-driven fix-up: rewrite every `entity` field of `type` on entities
 * tagged Restored.
 */
export function rewriteEntityFields(world: World, type: ComponentType, loaded: Loaded): void {
    const fields = entityFields(type);
    if (fields.length === 0) return;

    for (const eid of world.query(Restored, type)) {
        const view = world.view(eid, type);
        if (!view) continue;
        for (const field of fields) {
            const old = view[field];
            if (typeof old === 'number') {
                view[field] = loaded.mapOptional(old);
            }
        }
    }
}
