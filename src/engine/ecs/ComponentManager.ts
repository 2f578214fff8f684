/**
 * =============================================================================
 * COMPONENT-MANAGER.TS - Gestore centrale dei componenti
 * =============================================================================
 */

import type { ComponentRegistry } from '../../game/components';
import { EntityId, ComponentType } from './types';

type ComponentStores = { [K in ComponentType]?: Map<EntityId, ComponentRegistry[K]> };

export class ComponentManager {
    private _stores: ComponentStores;
    private _allStores: Set<Map<EntityId, unknown>>;
    private _queryCache: Map<string, EntityId[]>;

    constructor() {
        this._stores = {};
        this._allStores = new Set();
        this._queryCache = new Map();
    }

    private _storeFor<K extends ComponentType>(componentType: K): Map<EntityId, ComponentRegistry[K]> {
        let store: Map<EntityId, ComponentRegistry[K]> | undefined = this._stores[componentType];
        if (!store) {
            store = new Map<EntityId, ComponentRegistry[K]>();
            const stores: { [P in K]?: Map<EntityId, ComponentRegistry[P]> } = this._stores;
            stores[componentType] = store;
            this._allStores.add(store);
        }
        return store;
    }

    add<K extends ComponentType>(entityId: EntityId, componentType: K, componentData: ComponentRegistry[K]): ComponentRegistry[K] {
        componentData._type = componentType;
        componentData._entityId = entityId;

        this._storeFor(componentType).set(entityId, componentData);
        this._invalidateCache();

        return componentData;
    }

    get<K extends ComponentType>(entityId: EntityId, componentType: K): ComponentRegistry[K] | undefined {
        return this._stores[componentType]?.get(entityId);
    }

    /**
     * Come get(), ma un componente mancante è un errore di programmazione
     */
    require<K extends ComponentType>(entityId: EntityId, componentType: K): ComponentRegistry[K] {
        const component = this.get(entityId, componentType);
        if (!component) {
            throw new Error(`Componente "${componentType}" mancante sull'entità ${entityId}`);
        }
        return component;
    }

    has(entityId: EntityId, componentType: ComponentType): boolean {
        return this._stores[componentType]?.has(entityId) ?? false;
    }

    hasAll(entityId: EntityId, componentTypes: ComponentType[]): boolean {
        return componentTypes.every(type => this.has(entityId, type));
    }

    removeAllFromEntity(entityId: EntityId): number {
        let removed = 0;

        for (const store of this._allStores) {
            if (store.delete(entityId)) {
                removed++;
            }
        }

        if (removed > 0) {
            this._invalidateCache();
        }

        return removed;
    }

    /**
     * Entità che possiedono tutti i componenti richiesti, in ordine di inserimento
     */
    query(requiredTypes: ComponentType[]): EntityId[] {
        if (requiredTypes.length === 0) {
            return [];
        }

        const cacheKey = requiredTypes.slice().sort().join(',');
        const cached = this._queryCache.get(cacheKey);
        if (cached) {
            return cached.slice();
        }

        // Si parte dallo store più piccolo
        let smallest: Map<EntityId, unknown> | undefined;
        for (const type of requiredTypes) {
            const store = this._stores[type];
            if (!store) {
                return [];
            }
            if (!smallest || store.size < smallest.size) {
                smallest = store;
            }
        }

        const result: EntityId[] = [];
        if (smallest) {
            for (const entityId of smallest.keys()) {
                if (this.hasAll(entityId, requiredTypes)) {
                    result.push(entityId);
                }
            }
        }

        this._queryCache.set(cacheKey, result);

        return result.slice();
    }

    private _invalidateCache(): void {
        this._queryCache.clear();
    }

    clear(): void {
        for (const store of this._allStores) {
            store.clear();
        }
        this._stores = {};
        this._allStores.clear();
        this._queryCache.clear();
    }
}

export default ComponentManager;
