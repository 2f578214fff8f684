/**
 * =============================================================================
 * ENTITY-MANAGER.TS - Id delle entità e ritiro a due tempi
 * =============================================================================
 * Un velivolo che apponta viene ritirato a metà tick, mentre altri sistemi
 * possono ancora leggerne i componenti. Da ritirato non è più "vivo" per le
 * query; lo si dimentica solo con collectRetired() a fine tick.
 */

import { EntityId } from './types';

export class EntityManager {
    private _tags: Map<EntityId, string>;
    private _retired: Set<EntityId>;
    private _lastId: EntityId;

    constructor() {
        this._tags = new Map();
        this._retired = new Set();
        this._lastId = 0;
    }

    /** Ogni manager numera da 1 */
    create(tag: string): EntityId {
        const entityId = ++this._lastId;
        this._tags.set(entityId, tag);
        return entityId;
    }

    isAlive(entityId: EntityId): boolean {
        return this._tags.has(entityId) && !this._retired.has(entityId);
    }

    tagOf(entityId: EntityId): string | undefined {
        return this._tags.get(entityId);
    }

    /**
     * @returns false se l'entità non esiste o è già stata ritirata
     */
    retire(entityId: EntityId): boolean {
        if (!this.isAlive(entityId)) {
            return false;
        }
        this._retired.add(entityId);
        return true;
    }

    /**
     * Dimentica le entità ritirate e le restituisce, in ordine di ritiro
     */
    collectRetired(): EntityId[] {
        const retired = Array.from(this._retired);
        for (const entityId of retired) {
            this._tags.delete(entityId);
        }
        this._retired.clear();
        return retired;
    }

    clear(): void {
        this._tags.clear();
        this._retired.clear();
    }
}

export default EntityManager;
