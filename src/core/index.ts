/**
 * Core ECS - entity store primitives
 */

export * from './constants';
export * from './component';
export * from './entity-id';
export * from './query';
export * from './system';
export * from './world';
