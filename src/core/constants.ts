/**
 * ECS Constants
 *
 * Core constants for the entity store and its scheduler.
 */

/**
 * Default number of concurrent entities.
 *
 * Component storage is a set of TypedArrays sized to this capacity, so the
 * limit is hard. Pass `maxEntities` to the World to change it.
 */
export const MAX_ENTITIES = 10000;

/**
 * Entity ID format: [11 bits generation][20 bits index]
 * - Generation: bumped on free so stale references stop resolving
 * - Index: direct array index for O(1) component access
 *
 * The top bit stays clear so an ID always fits an Int32Array slot and
 * never collides with NULL_ENTITY.
 */
export const GENERATION_BITS = 11;
export const INDEX_BITS = 20;
export const INDEX_MASK = (1 << INDEX_BITS) - 1;
export const MAX_GENERATION = (1 << GENERATION_BITS) - 1;

/** Value of an `entity` field that points nowhere. */
export const NULL_ENTITY = -1;

/**
 * System execution phases (in order).
 *
 * `load` and `postLoad` run before any ordinary logic of the tick,
 * `save` runs after all of it.
 */
export const SYSTEM_PHASES = ['load', 'postLoad', 'first', 'update', 'last', 'save'] as const;

export type SystemPhase = typeof SYSTEM_PHASES[number];
