/**
 * Scene
 *
 * A detached, serializable capture of selected entities and their
 * components. A scene holds no reference to the world it came from.
 */

import type { ComponentType, ComponentValues } from '../core/component';
import { entityIndex } from '../core/entity-id';
import type { World } from '../core/world';
import type { TypeRegistry } from './registry';
import { SceneError } from './errors';

export interface SceneComponent {
    type: ComponentType;
    values: ComponentValues;
}

export interface SceneEntity {
    /** Entity index at the time of the save */
    index: number;
    components: SceneComponent[];
}

export interface Scene {
    entities: SceneEntity[];
}

/**
 * Capture exactly the given entities and every attached component whose
 * type is registered. Entities that are not alive are skipped, as are
 * repeated ids. Components are ordered by type name. The world is not
 * modified.
 */
export function extractScene(world: World, registry: TypeRegistry, entities: Iterable<number>): Scene {
    const scene: Scene = { entities: [] };
    const seen = new Set<number>();

    for (const eid of entities) {
        if (seen.has(eid) || !world.isAlive(eid)) continue;
        seen.add(eid);

        const components: SceneComponent[] = [];
        const types = world.getComponents(eid)
            .filter(type => registry.has(type))
            .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const type of types) {
            const values = world.read(eid, type);
            if (values) components.push({ type, values });
        }

        scene.entities.push({ index: entityIndex(eid), components });
    }

    return scene;
}

/**
 * Spawn every scene entity under a fresh identity and insert its components.
 * Returns the mapping saved index -> new entity. If any entity cannot be
 * written, everything spawned so far is despawned before the error is
 * rethrown.
 */
export function writeSceneToWorld(world: World, scene: Scene): Map<number, number> {
    const spawned = new Map<number, number>();
    let pending: number | null = null;

    try {
        for (const entity of scene.entities) {
            if (spawned.has(entity.index)) {
                throw new SceneError('ERR_FORMAT', `Entity index ${entity.index} appears twice in the scene`);
            }
            pending = world.spawn();
            for (const component of entity.components) {
                world.add(pending, component.type, component.values);
            }
            spawned.set(entity.index, pending);
            pending = null;
        }
    } catch (error) {
        if (pending !== null) world.despawn(pending);
        despawnAll(world, spawned.values());
        throw error;
    }

    return spawned;
}

/**
 * Roll back a partially applied scene.
 */
export function despawnAll(world: World, entities: Iterable<number>): void {
    for (const eid of entities) {
        world.despawn(eid);
    }
}
