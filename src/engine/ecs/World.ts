/**
 * =============================================================================
 * WORLD.TS - Entità, componenti e pipeline dei sistemi di una simulazione
 * =============================================================================
 * Un tick: i sistemi girano in ordine di priorità, poi le entità ritirate
 * durante il tick perdono i componenti ed escono dal World.
 */

import type { ComponentRegistry } from '../../game/components';
import type { SimulationEvents } from '../../game/events';
import { EntityManager } from './EntityManager';
import { ComponentManager } from './ComponentManager';
import { SystemManager } from './SystemManager';
import { EventBus } from '../events/EventBus';
import { EntityId, ComponentType, IWorld, ISystem, EventType, EventPayload } from './types';

export class World implements IWorld {
    public readonly components: ComponentManager;
    public readonly systems: SystemManager;

    private readonly _entities: EntityManager;
    private readonly _events: EventBus<SimulationEvents>;
    private _destroyed: boolean;

    constructor(events: EventBus<SimulationEvents>) {
        this._entities = new EntityManager();
        this._events = events;
        this.components = new ComponentManager();
        this.systems = new SystemManager(this);
        this._destroyed = false;
    }

    createEntity(tag: string = ''): EntityId {
        const entityId = this._entities.create(tag);
        this.emit('entity:created', { entityId, tag });
        return entityId;
    }

    /**
     * L'entità esce subito dalle query; i componenti restano leggibili
     * fino alla fine del tick
     */
    destroyEntity(entityId: EntityId): boolean {
        if (!this._entities.retire(entityId)) {
            return false;
        }
        this.emit('entity:destroying', { entityId, tag: this._entities.tagOf(entityId) ?? '' });
        return true;
    }

    entityExists(entityId: EntityId): boolean {
        return this._entities.isAlive(entityId);
    }

    addComponent<K extends ComponentType>(entityId: EntityId, type: K, data: ComponentRegistry[K]): ComponentRegistry[K] {
        if (!this._entities.isAlive(entityId)) {
            throw new Error(`Impossibile aggiungere "${type}": entità ${entityId} inesistente`);
        }
        return this.components.add(entityId, type, data);
    }

    getComponent<K extends ComponentType>(entityId: EntityId, type: K): ComponentRegistry[K] | undefined {
        return this.components.get(entityId, type);
    }

    queryEntities(componentTypes: ComponentType[]): EntityId[] {
        return this.components.query(componentTypes).filter(entityId => this._entities.isAlive(entityId));
    }

    registerSystem<S extends ISystem>(system: S): S {
        return this.systems.register(system);
    }

    emit<K extends EventType>(eventType: K, data: EventPayload<K>): void {
        this._events.emit(eventType, data);
    }

    on<K extends EventType>(eventType: K, callback: (data: EventPayload<K>) => void): () => void {
        return this._events.on(eventType, callback);
    }

    tick(deltaTime: number): void {
        if (this._destroyed) {
            throw new Error('World distrutto, tick non consentito');
        }

        this.systems.step(deltaTime);

        for (const entityId of this._entities.collectRetired()) {
            this.components.removeAllFromEntity(entityId);
            this.emit('entity:destroyed', { entityId });
        }
    }

    /**
     * Chiude i sistemi (che rilasciano le loro risorse) e svuota il World
     */
    destroy(): void {
        if (this._destroyed) return;

        this.systems.destroyAll();
        this._entities.clear();
        this.components.clear();
        this._destroyed = true;

        console.log('[World] Distrutto');
    }

    get isDestroyed(): boolean {
        return this._destroyed;
    }
}

export default World;
