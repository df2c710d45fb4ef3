/**
 * Scene text codec.
 *
 * Pretty-printed JSON, one record per entity, one field-named object per
 * component keyed by the component's durable name:
 *
 *   {
 *     "entities": [
 *       { "entity": 1, "components": { "Position": { "x": 4, "y": 7 } } }
 *     ]
 *   }
 *
 * The format is not versioned. Missing fields take the schema default.
 */

import type { ComponentValues, FieldDefinition } from '../core/component';
import { INDEX_MASK, NULL_ENTITY } from '../core/constants';
import type { TypeRegistry } from './registry';
import type { Scene, SceneComponent } from './scene';
import { SceneError } from './errors';

interface SceneDocument {
    entities: Array<{
        entity: number;
        components: Record<string, ComponentValues>;
    }>;
}

const I32_MIN = -0x80000000;
const I32_MAX = 0x7fffffff;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encode a scene as text. Throws ERR_FORMAT on a value JSON cannot carry.
 */
export function serializeScene(scene: Scene): string {
    const doc: SceneDocument = { entities: [] };

    for (const entity of scene.entities) {
        const components: Record<string, ComponentValues> = {};
        for (const { type, values } of entity.components) {
            for (const [field, value] of Object.entries(values)) {
                if (typeof value === 'number' && !Number.isFinite(value)) {
                    throw new SceneError(
                        'ERR_FORMAT',
                        `${type.name}.${field} of entity ${entity.index} is ${value}, which cannot be saved`
                    );
                }
            }
            components[type.name] = { ...values };
        }
        doc.entities.push({ entity: entity.index, components });
    }

    return JSON.stringify(doc, null, 2) + '\n';
}

/**
 * Decode text into a scene, resolving every component type against the
 * registry. Throws ERR_FORMAT for malformed text and ERR_SCHEMA for types,
 * fields or values the registry does not accept.
 */
export function deserializeScene(text: string, registry: TypeRegistry): Scene {
    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SceneError('ERR_FORMAT', `Scene is not valid JSON: ${reason}`, { cause: error });
    }

    if (!isRecord(doc) || !Array.isArray(doc.entities)) {
        throw new SceneError('ERR_FORMAT', `Scene must be an object with an 'entities' array`);
    }

    const records: unknown[] = doc.entities;
    const scene: Scene = { entities: [] };
    const seen = new Set<number>();

    records.forEach((record, position) => {
        if (!isRecord(record)) {
            throw new SceneError('ERR_FORMAT', `entities[${position}] is not an object`);
        }

        const index = record.entity;
        if (typeof index !== 'number' || !Number.isInteger(index) || index < 0 || index > INDEX_MASK) {
            throw new SceneError('ERR_FORMAT', `entities[${position}].entity is not a valid entity index`);
        }
        if (seen.has(index)) {
            throw new SceneError('ERR_FORMAT', `Entity index ${index} appears twice in the scene`);
        }
        seen.add(index);

        if (!isRecord(record.components)) {
            throw new SceneError('ERR_FORMAT', `entities[${position}].components is not an object`);
        }

        const components: SceneComponent[] = [];
        for (const [name, raw] of Object.entries(record.components)) {
            const type = registry.get(name);
            if (!type) {
                throw new SceneError('ERR_SCHEMA', `Unknown component type '${name}' on entity ${index}`);
            }
            if (!isRecord(raw)) {
                throw new SceneError('ERR_FORMAT', `${name} on entity ${index} is not an object`);
            }

            const values: ComponentValues = {};
            for (const [field, def] of Object.entries(type.schema)) {
                values[field] = def.default;
            }
            for (const [field, value] of Object.entries(raw)) {
                const def = type.schema[field];
                if (!def) {
                    throw new SceneError('ERR_SCHEMA', `Component '${name}' has no field '${field}' (entity ${index})`);
                }
                values[field] = decodeField(def, value, `${name}.${field} of entity ${index}`);
            }
            components.push({ type, values });
        }

        scene.entities.push({ index, components });
    });

    return scene;
}

function decodeField(def: FieldDefinition, value: unknown, where: string): number | boolean {
    if (def.type === 'bool') {
        if (typeof value !== 'boolean') {
            throw new SceneError('ERR_SCHEMA', `${where} must be a boolean`);
        }
        return value;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new SceneError('ERR_SCHEMA', `${where} must be a number`);
    }
    if ((def.type === 'i32' || def.type === 'u8' || def.type === 'entity') && !Number.isInteger(value)) {
        throw new SceneError('ERR_SCHEMA', `${where} must be an integer`);
    }
    if (!inRange(def, value)) {
        throw new SceneError('ERR_SCHEMA', `${where} is out of range for ${def.type}: ${value}`);
    }
    return value;
}

/**
 * Integer fields are stored in typed arrays, which would wrap an
 * out-of-range value into a different, valid-looking one.
 */
function inRange(def: FieldDefinition, value: number): boolean {
    switch (def.type) {
        case 'i32':
            return value >= I32_MIN && value <= I32_MAX;
        case 'u8':
            return value >= 0 && value <= 255;
        case 'entity':
            return value === NULL_ENTITY || (value >= 0 && value <= I32_MAX);
        default:
            return true;
    }
}
