/**
 * =============================================================================
 * MOVEMENT-SYSTEM.TS - Integrazione di Eulero della posa
 * =============================================================================
 * Gira dopo portaerei e velivoli: le velocità del tick sono già decise.
 */

import System from '../ecs/System';

const TWO_PI = Math.PI * 2;

/**
 * Riporta un angolo in [0, 2π). Un valore non finito passa invariato.
 */
export function normalizeAngle(angle: number): number {
    if (!Number.isFinite(angle)) {
        return angle;
    }
    let wrapped = angle;
    while (wrapped < 0) wrapped += TWO_PI;
    while (wrapped >= TWO_PI) wrapped -= TWO_PI;
    return wrapped;
}

export class MovementSystem extends System {
    constructor() {
        super('MovementSystem', 60);
    }

    update(deltaTime: number): void {
        for (const entityId of this.queryEntities(['Transform', 'Velocity'])) {
            const transform = this.getComponent(entityId, 'Transform');
            const velocity = this.getComponent(entityId, 'Velocity');
            if (!transform || !velocity) continue;

            transform.x += velocity.vx * deltaTime;
            transform.y += velocity.vy * deltaTime;
            transform.rotation = normalizeAngle(transform.rotation);
        }
    }
}

export default MovementSystem;
