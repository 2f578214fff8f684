/**
 * =============================================================================
 * ENGINE/INDEX.TS - Export principale dell'engine
 * =============================================================================
 */

// ECS Core
export {
    EntityManager,
    ComponentManager,
    System,
    SystemManager,
    World
} from './ecs';
export type { EntityId, ComponentType, IWorld, ISystem } from './ecs';

// Eventi
export { EventBus } from './events';

// Matematica
export { Vector2 } from './math/Vector2';
export type { Point2 } from './math/Vector2';

// Sistemi
export * from './systems';
