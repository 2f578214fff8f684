/**
 * =============================================================================
 * TRANSFORM.TS - Componente per posizione e rotazione
 * =============================================================================
 */

import { BaseComponent } from '../../engine/ecs/types';
import { Vector2 } from '../../engine/math/Vector2';

export interface TransformComponent extends BaseComponent {
    x: number;
    y: number;
    /** Radianti, antiorario dall'asse x */
    rotation: number;
}

export function createTransform(config: Partial<TransformComponent> = {}): TransformComponent {
    return {
        x: config.x ?? 0,
        y: config.y ?? 0,
        rotation: config.rotation ?? 0
    };
}

export function getPosition(transform: TransformComponent): Vector2 {
    return new Vector2(transform.x, transform.y);
}

export function setPosition(transform: TransformComponent, position: Vector2): void {
    transform.x = position.x;
    transform.y = position.y;
}

export default createTransform;
