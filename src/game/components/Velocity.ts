/**
 * =============================================================================
 * VELOCITY.TS - Componente per la velocità lineare
 * =============================================================================
 */

import { BaseComponent } from '../../engine/ecs/types';
import { Vector2 } from '../../engine/math/Vector2';

export interface VelocityComponent extends BaseComponent {
    vx: number;
    vy: number;
}

export function createVelocity(config: Partial<VelocityComponent> = {}): VelocityComponent {
    return {
        vx: config.vx ?? 0,
        vy: config.vy ?? 0
    };
}

export function getVelocity(velocity: VelocityComponent): Vector2 {
    return new Vector2(velocity.vx, velocity.vy);
}

export function setVelocity(velocity: VelocityComponent, value: Vector2): void {
    velocity.vx = value.x;
    velocity.vy = value.y;
}

export default createVelocity;
