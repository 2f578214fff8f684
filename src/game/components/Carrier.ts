/**
 * =============================================================================
 * CARRIER.TS - Componente della portaerei controllata dal giocatore
 * =============================================================================
 */

import { BaseComponent, EntityId } from '../../engine/ecs/types';
import { Vector2 } from '../../engine/math/Vector2';

export interface CarrierComponent extends BaseComponent {
    /** Velocità comandate in questo tick */
    linearSpeed: number;
    angularSpeed: number;

    // Movimento del tick corrente, letto dai velivoli in decollo
    deltaRotation: number;
    deltaPosition: Vector2;
    deltaVelocity: Vector2;

    /** Tempo di vita della nave, riferimento per i timer di ricarica */
    clock: number;
    aircraft: EntityId[];
    refillTimers: number[];
    capacity: number;
}

export function createCarrier(config: Partial<CarrierComponent> = {}): CarrierComponent {
    return {
        linearSpeed: config.linearSpeed ?? 0,
        angularSpeed: config.angularSpeed ?? 0,
        deltaRotation: config.deltaRotation ?? 0,
        deltaPosition: config.deltaPosition ?? Vector2.ZERO,
        deltaVelocity: config.deltaVelocity ?? Vector2.ZERO,
        clock: config.clock ?? 0,
        aircraft: config.aircraft ? [...config.aircraft] : [],
        refillTimers: config.refillTimers ? [...config.refillTimers] : [],
        capacity: config.capacity ?? 5
    };
}

/**
 * Velivoli in volo più slot ancora in ricarica
 */
export function occupiedSlots(carrier: CarrierComponent): number {
    return carrier.aircraft.length + carrier.refillTimers.length;
}

export function hasFreeSlot(carrier: CarrierComponent): boolean {
    return occupiedSlots(carrier) < carrier.capacity;
}

export default createCarrier;
