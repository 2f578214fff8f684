/**
 * =============================================================================
 * PLACEMENT-SYSTEM.TS - Comunica all'host la posa di ogni entità visibile
 * =============================================================================
 * Gira per ultimo: una chiamata placeMesh per tick e per entità viva.
 * La mesh di un'entità distrutta viene rilasciata subito, una volta sola.
 */

import System from '../engine/ecs/System';
import { IWorld } from '../engine/ecs/types';

export class PlacementSystem extends System {
    private _released: number;

    constructor() {
        super('PlacementSystem', 10);
        this._released = 0;
    }

    init(world: IWorld): void {
        super.init(world);

        // Su "destroying" i componenti sono ancora presenti
        this.on('entity:destroying', ({ entityId }) => {
            const renderable = this.getComponent(entityId, 'Renderable');
            if (renderable && renderable.mesh.release()) {
                this._released++;
            }
        });

        console.log('[PlacementSystem] Inizializzato');
    }

    update(_deltaTime: number): void {
        for (const entityId of this.queryEntities(['Renderable', 'Transform'])) {
            const renderable = this.getComponent(entityId, 'Renderable');
            const transform = this.getComponent(entityId, 'Transform');
            if (!renderable || !transform) continue;

            renderable.mesh.place(transform.x, transform.y, transform.rotation);
        }
    }

    /**
     * Rilascia le mesh delle entità ancora vive
     */
    destroy(): void {
        for (const entityId of this.queryEntities(['Renderable'])) {
            const renderable = this.getComponent(entityId, 'Renderable');
            if (renderable && renderable.mesh.release()) {
                this._released++;
            }
        }

        console.log(`[PlacementSystem] Distrutto - ${this._released} mesh rilasciate`);
        super.destroy();
    }
}

export default PlacementSystem;
