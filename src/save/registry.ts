/**
 * Type Registry
 *
 * The set of component types that are serializable. Only registered types
 * are captured by a save and only registered types can be read back.
 * Attached components of unregistered types are skipped without notice,
 * which is what keeps visual/transient state out of scenes, and also how
 * data is lost when a type is forgotten here.
 */

import type { ComponentType } from '../core/component';

export class TypeRegistry {
    private types: Map<string, ComponentType> = new Map();

    /**
     * Register component types as serializable. Re-registering the same
     * definition is a no-op; a different definition under a taken name throws.
     */
    register(...components: ComponentType[]): this {
        for (const component of components) {
            const existing = this.types.get(component.name);
            if (existing && existing !== component) {
                throw new Error(`Another component is already registered as '${component.name}'`);
            }
            this.types.set(component.name, component);
        }
        return this;
    }

    has(component: ComponentType): boolean {
        return this.types.get(component.name) === component;
    }

    /**
     * Look up a type by its durable name.
     */
    get(name: string): ComponentType | undefined {
        return this.types.get(name);
    }

    get size(): number {
        return this.types.size;
    }
}
