/**
 * =============================================================================
 * TYPES.TS - Contratti dell'ECS usati da sistemi e simulazione
 * =============================================================================
 */

import type { ComponentRegistry } from '../../game/components';
import type { SimulationEvents } from '../../game/events';

export type EntityId = number;

/** Uno dei componenti dichiarati in ComponentRegistry */
export type ComponentType = keyof ComponentRegistry;

export interface BaseComponent {
    _type?: ComponentType;
    _entityId?: EntityId;
}

export type EventType = keyof SimulationEvents;
export type EventPayload<K extends EventType> = SimulationEvents[K];

/**
 * Quello che un sistema vede del World
 */
export interface IWorld {
    createEntity(tag?: string): EntityId;
    destroyEntity(entityId: EntityId): boolean;
    entityExists(entityId: EntityId): boolean;
    addComponent<K extends ComponentType>(entityId: EntityId, type: K, data: ComponentRegistry[K]): ComponentRegistry[K];
    getComponent<K extends ComponentType>(entityId: EntityId, type: K): ComponentRegistry[K] | undefined;
    queryEntities(components: ComponentType[]): EntityId[];

    emit<K extends EventType>(event: K, data: EventPayload<K>): void;
    on<K extends EventType>(event: K, callback: (data: EventPayload<K>) => void): () => void;
}

export interface ISystem {
    readonly name: string;
    /** Più alta = eseguito prima nel tick */
    readonly priority: number;

    init(world: IWorld): void;
    update(deltaTime: number): void;
    destroy(): void;
}
