// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World, EntityBuilder } from './World';
export { EntityManager } from './Entity';
export { ComponentStore } from './Component';
export { ComponentManager } from './ComponentManager';
export { EcsInvariantError } from './errors';

// Types and helpers
export { sameEntity, isComponentEnabled, formatEntity } from './types';
export type { Entity, EntityId, ComponentType, Toggleable } from './types';
export type { ComponentStorage } from './Component';
