/**
 * Component System
 *
 * Components are pure data containers. This module handles:
 * - Component type definitions with schemas
 * - Type inference from default values
 * - SoA (Structure of Arrays) storage allocation
 * - Accessor generation (live views over storage)
 *
 * A ComponentType is only a schema. Storage lives in the World that
 * attaches it, so two worlds never share component data.
 */

import { NULL_ENTITY } from './constants';

/**
 * Supported field types for components.
 * - i32: 32-bit integer
 * - u8: 8-bit unsigned (for flags, enums)
 * - bool: boolean (stored as u8)
 * - f32: 32-bit float
 * - f64: 64-bit float (default for numbers)
 * - entity: reference to another entity, NULL_ENTITY when unset
 */
export type FieldType = 'i32' | 'u8' | 'bool' | 'f32' | 'f64' | 'entity';

export type FieldValue = number | boolean;

export interface FieldDefinition {
    type: FieldType;
    default: FieldValue;
}

export interface ComponentSchema {
    [fieldName: string]: FieldDefinition;
}

/** Default value, or an explicit `{ type, default }` pair. */
export type FieldInit = number | boolean | { type: FieldType; default?: FieldValue };

/** Plain, detached field values of one component instance. */
export type ComponentValues = Record<string, FieldValue>;

type FieldValueOf<F> =
    F extends boolean ? boolean :
    F extends { type: 'bool' } ? boolean :
    number;

export type ValuesOf<D extends Record<string, FieldInit>> = {
    [K in keyof D]: FieldValueOf<D[K]>;
};

export type FieldArray = Int32Array | Uint8Array | Float32Array | Float64Array;

/**
 * Component storage using Structure of Arrays (SoA) pattern.
 * Each field is stored in a separate TypedArray indexed by entity index.
 */
export interface ComponentStorage {
    /** Bitmask tracking which entity indices have this component */
    mask: Uint32Array;

    /** Field arrays indexed by entity index */
    fields: Record<string, FieldArray>;

    /** Schema defining field types */
    schema: ComponentSchema;
}

/**
 * Component type definition.
 */
export interface ComponentType<T extends object = object> {
    /** Durable identifier, also the key used in saved scenes */
    readonly name: string;
    readonly schema: ComponentSchema;
    readonly fieldNames: string[];
    readonly defaults: Readonly<T>;
}

/**
 * Infer field definition from a default value.
 * Plain numbers become f64; `entity` fields default to NULL_ENTITY.
 */
export function inferFieldDef(value: FieldInit): FieldDefinition {
    if (typeof value === 'boolean') {
        return { type: 'bool', default: value };
    }

    if (typeof value === 'number') {
        return { type: 'f64', default: value };
    }

    if (value.type === 'bool') {
        return { type: 'bool', default: value.default ?? false };
    }
    if (typeof value.default === 'boolean') {
        throw new Error(`Field of type '${value.type}' cannot default to a boolean`);
    }
    if (value.type === 'entity') {
        return { type: 'entity', default: value.default ?? NULL_ENTITY };
    }
    return { type: value.type, default: value.default ?? 0 };
}

/**
 * Create TypedArray for a field type.
 */
function createFieldArray(type: FieldType, capacity: number): FieldArray {
    switch (type) {
        case 'i32':
        case 'entity':
            return new Int32Array(capacity);
        case 'u8':
        case 'bool':
            return new Uint8Array(capacity);
        case 'f32':
            return new Float32Array(capacity);
        case 'f64':
            return new Float64Array(capacity);
    }
}

/**
 * Create SoA storage for a component schema.
 */
export function createComponentStorage(schema: ComponentSchema, capacity: number): ComponentStorage {
    const fields: Record<string, FieldArray> = {};

    for (const [name, def] of Object.entries(schema)) {
        fields[name] = createFieldArray(def.type, capacity);
    }

    return {
        mask: new Uint32Array(Math.ceil(capacity / 32)),
        fields,
        schema
    };
}

/**
 * Read one field of one entity.
 */
export function readField(storage: ComponentStorage, field: string, index: number): FieldValue {
    const arr = storage.fields[field];
    const def = storage.schema[field];
    if (!arr || !def) {
        throw new Error(`Unknown field '${field}'`);
    }
    const value = arr[index];
    return def.type === 'bool' ? value !== 0 : value;
}

/**
 * Write one field of one entity.
 */
export function writeField(storage: ComponentStorage, field: string, index: number, value: FieldValue): void {
    const arr = storage.fields[field];
    if (!arr) {
        throw new Error(`Unknown field '${field}'`);
    }
    arr[index] = typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

/**
 * Copy all fields of one entity into a plain object.
 */
export function readValues(storage: ComponentStorage, index: number): ComponentValues {
    const out: ComponentValues = {};
    for (const field of Object.keys(storage.schema)) {
        out[field] = readField(storage, field, index);
    }
    return out;
}

/**
 * Write a (partial) set of values. Unknown keys and non-scalar values throw.
 */
export function writeValues(storage: ComponentStorage, componentName: string, index: number, values: {}): void {
    for (const [field, value] of Object.entries(values)) {
        if (value === undefined) continue;
        if (!(field in storage.schema)) {
            throw new Error(`Component '${componentName}' has no field '${field}'`);
        }
        if (typeof value !== 'number' && typeof value !== 'boolean') {
            throw new Error(`Field '${componentName}.${field}' must be a number or boolean`);
        }
        writeField(storage, field, index, value);
    }
}

/**
 * Generate an accessor factory for a component storage.
 * Getters/setters live on one shared prototype (not Proxy); each accessor
 * only carries its entity index. Reads and writes go straight to storage.
 */
export function generateAccessorFactory(storage: ComponentStorage): (index: number) => ComponentValues {
    const prototype = {};

    for (const fieldName of Object.keys(storage.schema)) {
        Object.defineProperty(prototype, fieldName, {
            get(this: { _index: number }): FieldValue {
                return readField(storage, fieldName, this._index);
            },
            set(this: { _index: number }, value: FieldValue) {
                writeField(storage, fieldName, this._index, value);
            },
            enumerable: true,
            configurable: false
        });
    }

    return (index: number): ComponentValues => {
        const accessor: ComponentValues = Object.create(prototype, {
            _index: { value: index, writable: false, enumerable: false, configurable: false }
        });
        return accessor;
    };
}

/**
 * Check if entity has component (via bitmask).
 */
export function hasComponent(storage: ComponentStorage, index: number): boolean {
    const word = index >>> 5;
    const bit = 1 << (index & 31);
    return ((storage.mask[word] ?? 0) & bit) !== 0;
}

/**
 * Add component to entity (set bit in mask).
 */
export function addComponentToEntity(storage: ComponentStorage, index: number): void {
    const word = index >>> 5;
    const bit = 1 << (index & 31);
    storage.mask[word] |= bit;
}

/**
 * Remove component from entity (clear bit in mask).
 */
export function removeComponentFromEntity(storage: ComponentStorage, index: number): void {
    const word = index >>> 5;
    const bit = 1 << (index & 31);
    storage.mask[word] &= ~bit;
}

/**
 * Initialize component fields to defaults for an entity.
 */
export function initializeComponentDefaults(storage: ComponentStorage, index: number): void {
    for (const [fieldName, fieldDef] of Object.entries(storage.schema)) {
        writeField(storage, fieldName, index, fieldDef.default);
    }
}

/**
 * Names of the fields holding entity references.
 */
export function entityFields(component: ComponentType): string[] {
    return component.fieldNames.filter(name => component.schema[name]?.type === 'entity');
}

/**
 * Define a new component type.
 *
 * @param name Unique component name, used as the type key in saved scenes
 * @param defaults Default values (type inferred from values)
 * @returns ComponentType for use with World.add / World.get
 *
 * @example
 * const Health = defineComponent('Health', { current: 100, max: 100 });
 * const Target = defineComponent('Target', { entity: { type: 'entity' } });
 * const Persist = defineComponent('Persist', {});
 */
export function defineComponent<D extends Record<string, FieldInit>>(
    name: string,
    defaults: D
): ComponentType<ValuesOf<D>> {
    if (name.length === 0) {
        throw new Error('Component name must not be empty');
    }

    // Build schema from defaults
    const schema: ComponentSchema = {};
    const values: ComponentValues = {};
    for (const [fieldName, init] of Object.entries(defaults)) {
        const def = inferFieldDef(init);
        schema[fieldName] = def;
        values[fieldName] = def.default;
    }

    const componentType: ComponentType = {
        name,
        schema,
        fieldNames: Object.keys(schema),
        defaults: values
    };

    return componentType as ComponentType<ValuesOf<D>>;
}
