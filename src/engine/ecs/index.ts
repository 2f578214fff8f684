/**
 * =============================================================================
 * ECS/INDEX.TS - Export centralizzato del modulo ECS
 * =============================================================================
 */

export { EntityManager } from './EntityManager';
export { ComponentManager } from './ComponentManager';
export { System } from './System';
export { SystemManager } from './SystemManager';
export { World } from './World';
export type { EntityId, ComponentType, BaseComponent, EventType, EventPayload, IWorld, ISystem } from './types';
