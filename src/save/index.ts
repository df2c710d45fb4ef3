/**
 * Scene persistence - save/load of Persist entities with reference fix-up
 */

export * from './errors';
export * from './markers';
export * from './request';
export * from './registry';
export * from './scene';
export * from './codec';
export * from './fixup';
export * from './save';
export * from './load';
export * from './plugin';
