/**
 * Entity ID Allocator
 *
 * Manages entity ID allocation with generation counters for ABA safety.
 * Entity ID format: [11 bits generation][20 bits index]
 */

import {
    MAX_ENTITIES,
    INDEX_MASK,
    INDEX_BITS,
    MAX_GENERATION
} from './constants';

/**
 * Get the index portion of an entity ID.
 */
export function entityIndex(eid: number): number {
    return eid & INDEX_MASK;
}

/**
 * Get the generation portion of an entity ID.
 */
export function entityGeneration(eid: number): number {
    return eid >>> INDEX_BITS;
}

/**
 * Compose an entity ID from its parts.
 */
export function makeEntity(index: number, generation: number): number {
    return ((generation & MAX_GENERATION) << INDEX_BITS) | (index & INDEX_MASK);
}

/**
 * Human readable form, e.g. `3v1` for index 3 generation 1.
 */
export function formatEntity(eid: number): string {
    return `${entityIndex(eid)}v${entityGeneration(eid)}`;
}

export class EntityIdAllocator {
    /** Generation counter for each entity slot */
    private generations: Uint16Array;

    /** Free list of available indices (sorted ascending) */
    private freeList: number[] = [];

    /** Next index to allocate if free list is empty */
    private nextIndex: number = 0;

    constructor(readonly capacity: number = MAX_ENTITIES) {
        if (capacity > INDEX_MASK + 1) {
            throw new Error(`Entity capacity ${capacity} exceeds the ${INDEX_BITS}-bit index space`);
        }
        this.generations = new Uint16Array(capacity);
    }

    /**
     * Allocate a new entity ID.
     * Returns entity ID with generation encoded.
     */
    allocate(): number {
        let index: number;

        const reused = this.freeList.shift();
        if (reused !== undefined) {
            // Always take the LOWEST available index
            index = reused;
        } else {
            if (this.nextIndex >= this.capacity) {
                throw new Error(
                    `Entity limit exceeded (capacity=${this.capacity}). ` +
                    `Despawn unused entities or raise maxEntities.`
                );
            }
            index = this.nextIndex++;
        }

        return makeEntity(index, this.generations[index] ?? 0);
    }

    /**
     * Free an entity ID, returning it to the pool.
     * Increments generation to invalidate stale references.
     */
    free(eid: number): void {
        if (!this.isValid(eid)) return;
        const index = entityIndex(eid);

        // Increment generation (wrap at max)
        this.generations[index] = ((this.generations[index] ?? 0) + 1) & MAX_GENERATION;

        // Binary search insert to keep the free list sorted
        const insertIdx = this.findInsertIndex(index);
        this.freeList.splice(insertIdx, 0, index);
    }

    /**
     * Check if an entity ID is still valid (generation matches).
     */
    isValid(eid: number): boolean {
        if (eid < 0) return false;
        const index = entityIndex(eid);
        return index < this.nextIndex
            && this.generations[index] === entityGeneration(eid)
            && !this.isFree(index);
    }

    /**
     * Get number of active entities.
     */
    getActiveCount(): number {
        return this.nextIndex - this.freeList.length;
    }

    private isFree(index: number): boolean {
        const at = this.findInsertIndex(index);
        return this.freeList[at] === index;
    }

    /**
     * Binary search to find insert position for sorted free list.
     */
    private findInsertIndex(index: number): number {
        let lo = 0;
        let hi = this.freeList.length;

        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if ((this.freeList[mid] ?? 0) < index) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }

        return lo;
    }
}
