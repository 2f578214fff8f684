/**
 * =============================================================================
 * FLIGHT.TS - Componente di stato di volo di un velivolo
 * =============================================================================
 */

import { BaseComponent, EntityId } from '../../engine/ecs/types';
import { ApproachPhaseType } from '../../engine/systems/SteeringBehaviors';

export const FlightPhase = {
    TAKEOFF: 'takeoff',
    ACTIVE: 'active',
    RETURNING: 'returning'
} as const;

export type FlightPhaseType = typeof FlightPhase[keyof typeof FlightPhase];

export interface FlightComponent extends BaseComponent {
    carrierId: EntityId;
    /** Secondi trascorsi dal lancio */
    age: number;
    /** Derivata da age a ogni tick, serve solo a notificare i cambi di fase */
    phase: FlightPhaseType;
    /** Ultima fase di avvicinamento calcolata; telemetria, mai riletta dalla guida */
    approach: ApproachPhaseType | null;
}

export function createFlight(config: Partial<FlightComponent> = {}): FlightComponent {
    return {
        carrierId: config.carrierId ?? -1,
        age: config.age ?? 0,
        phase: config.phase ?? FlightPhase.TAKEOFF,
        approach: config.approach ?? null
    };
}

export function resolveFlightPhase(age: number, takeoffTime: number, liveTime: number): FlightPhaseType {
    if (age < takeoffTime) {
        return FlightPhase.TAKEOFF;
    }
    return age < liveTime ? FlightPhase.ACTIVE : FlightPhase.RETURNING;
}

export default createFlight;
