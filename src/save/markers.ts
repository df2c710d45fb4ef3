/**
 * Marker components driving the save/load lifecycle.
 */

import { defineComponent } from '../core/component';

/**
 * The entity is captured by filtered saves and despawned (recursively)
 * before every load. Loaded entities get it back automatically.
 */
export const Persist = defineComponent('Persist', {});

/**
 * The entity is despawned (recursively) before every load but never saved.
 * Use it for state rebuilt from loaded data, e.g. visuals.
 */
export const Unload = defineComponent('Unload', {});

/**
 * Transient tag on an entity that was just re-created from a scene.
 * `index` is the entity index it had when saved. Removed at the end of
 * the postLoad phase.
 */
export const Restored = defineComponent('Restored', {
    index: { type: 'i32', default: -1 }
});
