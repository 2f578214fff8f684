/**
 * =============================================================================
 * COMPONENTS/INDEX.TS - Export centralizzato dei componenti
 * =============================================================================
 */

import type { TransformComponent } from './Transform';
import type { VelocityComponent } from './Velocity';
import type { CarrierComponent } from './Carrier';
import type { FlightComponent } from './Flight';
import type { RenderableComponent } from './Renderable';

export { createTransform, getPosition, setPosition, type TransformComponent } from './Transform';
export { createVelocity, getVelocity, setVelocity, type VelocityComponent } from './Velocity';
export { createCarrier, occupiedSlots, hasFreeSlot, type CarrierComponent } from './Carrier';
export { createFlight, resolveFlightPhase, FlightPhase, type FlightPhaseType, type FlightComponent } from './Flight';
export { createRenderable, MeshKind, type MeshKindType, type RenderableComponent } from './Renderable';

/**
 * Mappa nome componente -> tipo dei dati
 */
export interface ComponentRegistry {
    Transform: TransformComponent;
    Velocity: VelocityComponent;
    Carrier: CarrierComponent;
    Flight: FlightComponent;
    Renderable: RenderableComponent;
}

/**
 * Registry dei tipi di componenti
 */
export const COMPONENT_TYPES = {
    TRANSFORM: 'Transform',
    VELOCITY: 'Velocity',
    CARRIER: 'Carrier',
    FLIGHT: 'Flight',
    RENDERABLE: 'Renderable'
} as const satisfies Record<string, keyof ComponentRegistry>;
