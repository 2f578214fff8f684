/**
 * =============================================================================
 * SYSTEM.TS - Base dei sistemi della simulazione
 * =============================================================================
 * Accesso al World dopo init() e listener sull'EventBus che vengono
 * staccati da soli in destroy().
 */

import type { ComponentRegistry } from '../../game/components';
import { ISystem, IWorld, EntityId, ComponentType, EventType, EventPayload } from './types';

export abstract class System implements ISystem {
    public readonly name: string;
    public readonly priority: number;
    public world: IWorld | null;

    private _unsubscribers: Array<() => void>;

    constructor(name: string, priority: number) {
        this.name = name;
        this.priority = priority;
        this.world = null;
        this._unsubscribers = [];
    }

    init(world: IWorld): void {
        this.world = world;
    }

    abstract update(deltaTime: number): void;

    destroy(): void {
        this._unsubscribers.forEach(unsubscribe => unsubscribe());
        this._unsubscribers = [];
        this.world = null;
    }

    /**
     * Il World, o un errore se il sistema non è (più) registrato
     */
    protected get requireWorld(): IWorld {
        if (!this.world) {
            throw new Error(`[${this.name}] Nessun World: sistema non registrato o già distrutto`);
        }
        return this.world;
    }

    protected queryEntities(componentTypes: ComponentType[]): EntityId[] {
        return this.world ? this.world.queryEntities(componentTypes) : [];
    }

    protected getComponent<K extends ComponentType>(entityId: EntityId, componentType: K): ComponentRegistry[K] | undefined {
        return this.world?.getComponent(entityId, componentType);
    }

    protected emit<K extends EventType>(eventType: K, data: EventPayload<K>): void {
        this.requireWorld.emit(eventType, data);
    }

    /**
     * Listener che vive quanto il sistema
     */
    on<K extends EventType>(eventType: K, callback: (data: EventPayload<K>) => void): void {
        this._unsubscribers.push(this.requireWorld.on(eventType, callback));
    }
}

export default System;
