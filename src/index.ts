/**
 * ecs-scene-persist
 *
 * Features:
 * - Entity store with generational ids and typed components
 * - Phase scheduler: load, postLoad, first, update, last, save
 * - Atomic scene save/load of Persist entities
 * - Old index -> new entity mapping for reference fix-up after a load
 */

// ============================================
// Core ECS
// ============================================
export {
    World,
    EntityBuilder,
    EntityIdAllocator,
    QueryEngine,
    QueryIterator,
    SystemScheduler,
    defineComponent,
    entityIndex,
    entityGeneration,
    makeEntity,
    formatEntity,
    MAX_ENTITIES,
    INDEX_BITS,
    INDEX_MASK,
    GENERATION_BITS,
    MAX_GENERATION,
    NULL_ENTITY,
    SYSTEM_PHASES
} from './core';

export type {
    WorldConfig,
    ComponentType,
    ComponentSchema,
    ComponentValues,
    FieldType,
    FieldValue,
    FieldInit,
    SystemFn,
    SystemOptions,
    SystemPhase
} from './core';

// ============================================
// Scene persistence
// ============================================
export {
    SavePlugin,
    Persist,
    Unload,
    Restored,
    Loaded,
    FixupRegistry,
    TypeRegistry,
    RequestSlot,
    SceneError,
    extractScene,
    writeSceneToWorld,
    serializeScene,
    deserializeScene,
    SaveExecutor,
    LoadExecutor,
    unloadWorld,
    readSceneFile,
    writeSceneFile
} from './save';

export type {
    SavePluginOptions,
    SaveCallbacks,
    SaveMode,
    Request,
    Scene,
    SceneEntity,
    SceneComponent,
    SceneErrorCode,
    FixupFn,
    LoadState
} from './save';
