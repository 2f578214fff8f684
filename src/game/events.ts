/**
 * =============================================================================
 * EVENTS.TS - Catalogo degli eventi della simulazione e dei loro payload
 * =============================================================================
 */

import type { EntityId } from '../engine/ecs/types';
import type { InputActionType, PointerButtonType } from '../engine/systems/InputSystem';
import type { ApproachPhaseType } from '../engine/systems/SteeringBehaviors';
import type { FlightPhaseType } from './components/Flight';

export interface SimulationEvents {
    'entity:created': { entityId: EntityId; tag: string };
    'entity:destroying': { entityId: EntityId; tag: string };
    'entity:destroyed': { entityId: EntityId };

    'input:action:pressed': { action: InputActionType; keyCode: string };
    'input:action:released': { action: InputActionType; keyCode: string };
    'input:pointer': { x: number; y: number; button: PointerButtonType };

    'goal:set': { x: number; y: number };

    'aircraft:launched': { entityId: EntityId; carrierId: EntityId; x: number; y: number; rotation: number };
    'aircraft:launch-rejected': { carrierId: EntityId; airborne: number; refilling: number; capacity: number };
    'aircraft:phase': { entityId: EntityId; from: FlightPhaseType; to: FlightPhaseType };
    'aircraft:approach': { entityId: EntityId; phase: ApproachPhaseType; distanceToIntersection: number };
    'aircraft:landed': { entityId: EntityId; carrierId: EntityId; refillStartedAt: number };

    'carrier:refilled': { carrierId: EntityId; available: number };
}

export type SimulationEventType = keyof SimulationEvents;
