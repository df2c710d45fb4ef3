/**
 * Query Engine
 *
 * Component indices for entity queries.
 * Queries return iterators with snapshot semantics for safe mutation.
 */

import type { ComponentType } from './component';
import { entityIndex } from './entity-id';

/**
 * Function to check if entity is destroyed.
 */
export type DestroyedChecker = (eid: number) => boolean;

/**
 * Query iterator with snapshot semantics.
 * Captures eid list at creation time, so despawning while iterating is safe;
 * entities despawned after creation are skipped.
 */
export class QueryIterator implements Iterable<number> {
    private eids: number[];
    private isDestroyed: DestroyedChecker;

    constructor(matchingEids: number[], isDestroyed: DestroyedChecker) {
        // Copy eids at creation time - safe from mutation
        this.eids = matchingEids.slice();
        this.isDestroyed = isDestroyed;
    }

    *[Symbol.iterator](): Iterator<number> {
        for (const eid of this.eids) {
            // Skip destroyed entities
            if (!this.isDestroyed(eid)) yield eid;
        }
    }

    /**
     * Convert to array (allocates).
     */
    toArray(): number[] {
        return Array.from(this);
    }

    /**
     * Get first matching entity.
     */
    first(): number | null {
        for (const eid of this) {
            return eid;
        }
        return null;
    }

    /**
     * Get the only matching entity; throws if there are none or several.
     */
    single(): number {
        const all = this.toArray();
        if (all.length !== 1) {
            throw new Error(`Expected exactly one entity, found ${all.length}`);
        }
        return all[0];
    }

    /**
     * Count entities without allocating array.
     */
    count(): number {
        let count = 0;
        for (const _ of this) {
            count++;
        }
        return count;
    }
}

/**
 * Query engine - manages component indices.
 */
export class QueryEngine {
    /** Component index: component name -> set of eids */
    private componentIndex: Map<string, Set<number>> = new Map();

    constructor(private isDestroyed: DestroyedChecker) {}

    /**
     * Add component to an existing entity.
     */
    addComponent(eid: number, component: ComponentType): void {
        let compSet = this.componentIndex.get(component.name);
        if (!compSet) {
            compSet = new Set();
            this.componentIndex.set(component.name, compSet);
        }
        compSet.add(eid);
    }

    /**
     * Remove component from an existing entity.
     */
    removeComponent(eid: number, component: ComponentType): void {
        this.componentIndex.get(component.name)?.delete(eid);
    }

    /**
     * Remove an entity from all indices.
     */
    removeEntity(eid: number, components: ComponentType[]): void {
        for (const component of components) {
            this.removeComponent(eid, component);
        }
    }

    /**
     * Query by component(s) - entities must have ALL specified components.
     */
    byComponents(...components: ComponentType[]): QueryIterator {
        if (components.length === 0) {
            return new QueryIterator([], this.isDestroyed);
        }

        // Start with the smallest set for efficiency
        let smallestSet: Set<number> | undefined;
        let smallestSize = Infinity;

        for (const component of components) {
            const compSet = this.componentIndex.get(component.name);
            if (!compSet || compSet.size === 0) {
                // One component has no entities, result is empty
                return new QueryIterator([], this.isDestroyed);
            }
            if (compSet.size < smallestSize) {
                smallestSize = compSet.size;
                smallestSet = compSet;
            }
        }

        if (!smallestSet) {
            return new QueryIterator([], this.isDestroyed);
        }

        // Filter to entities that have ALL components
        const result: number[] = [];
        for (const eid of smallestSet) {
            if (components.every(c => this.componentIndex.get(c.name)?.has(eid))) {
                result.push(eid);
            }
        }

        return new QueryIterator(this.sorted(result), this.isDestroyed);
    }

    /**
     * Query by component(s) - entities must have AT LEAST ONE of them.
     */
    byAnyComponent(...components: ComponentType[]): QueryIterator {
        const union = new Set<number>();
        for (const component of components) {
            const compSet = this.componentIndex.get(component.name);
            if (!compSet) continue;
            for (const eid of compSet) union.add(eid);
        }
        return new QueryIterator(this.sorted(Array.from(union)), this.isDestroyed);
    }

    /**
     * Sort by entity index for stable iteration order.
     */
    private sorted(eids: number[]): number[] {
        return eids.sort((a, b) => entityIndex(a) - entityIndex(b));
    }
}
