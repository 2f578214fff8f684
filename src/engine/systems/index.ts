/**
 * =============================================================================
 * SYSTEMS/INDEX.TS - Export centralizzato dei sistemi engine
 * =============================================================================
 */

export { InputSystem, InputAction, PointerButton, DEFAULT_KEY_BINDINGS } from './InputSystem';
export type { InputActionType, PointerButtonType } from './InputSystem';
export { CarrierSystem } from './CarrierSystem';
export type { CarrierSpawnOptions } from './CarrierSystem';
export { FlightSystem } from './FlightSystem';
export type { CarrierView, AircraftState } from './FlightSystem';
export { MovementSystem, normalizeAngle } from './MovementSystem';
export { SteeringBehaviors, ApproachPhase, ALIGNMENT_EPSILON, lineIntersection } from './SteeringBehaviors';
export type { ApproachPhaseType, SteeringConfig, LandingApproach } from './SteeringBehaviors';
