/**
 * =============================================================================
 * SYSTEM-MANAGER.TS - Pipeline del tick
 * =============================================================================
 * I sistemi restano ordinati per priorità decrescente dal momento in cui
 * vengono registrati; a parità di priorità vale l'ordine di registrazione.
 */

import { ISystem, IWorld } from './types';

export class SystemManager {
    private readonly _world: IWorld;
    private _pipeline: ISystem[];
    private _failures: number;

    constructor(world: IWorld) {
        this._world = world;
        this._pipeline = [];
        this._failures = 0;
    }

    register<S extends ISystem>(system: S): S {
        if (this._pipeline.some(existing => existing.name === system.name)) {
            throw new Error(`Sistema "${system.name}" già registrato`);
        }

        const slot = this._pipeline.findIndex(existing => existing.priority < system.priority);
        this._pipeline.splice(slot === -1 ? this._pipeline.length : slot, 0, system);
        system.init(this._world);

        console.log(`[SystemManager] ${system.name} in pipeline (priorità ${system.priority})`);
        return system;
    }

    /**
     * Un sistema che lancia viene loggato; il tick prosegue con i successivi
     */
    step(deltaTime: number): void {
        for (const system of this._pipeline) {
            try {
                system.update(deltaTime);
            } catch (error) {
                this._failures++;
                console.error(`[SystemManager] ${system.name} fallito al tick:`, error);
            }
        }
    }

    destroyAll(): void {
        // Ordine inverso rispetto al tick
        for (const system of [...this._pipeline].reverse()) {
            try {
                system.destroy();
            } catch (error) {
                console.error(`[SystemManager] ${system.name} fallito in chiusura:`, error);
            }
        }
        this._pipeline = [];
    }

    get order(): string[] {
        return this._pipeline.map(system => system.name);
    }

    get failures(): number {
        return this._failures;
    }
}

export default SystemManager;
