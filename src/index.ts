/**
 * =============================================================================
 * INDEX.TS - API pubblica del pacchetto
 * =============================================================================
 */

export * from './engine';
export * from './game/components';
export type { SimulationEvents, SimulationEventType } from './game/events';
export {
    SHIP_PARAMS,
    AIRCRAFT_PARAMS,
    calculateLandingRadius,
    validateParams,
    createSimulationParams
} from './game/config/SimulationParams';
export type {
    ShipParams,
    AircraftParams,
    SimulationParams,
    SimulationParamsOverrides
} from './game/config/SimulationParams';
export { createGoal } from './game/Goal';
export type { GoalPoint } from './game/Goal';
export { Simulation } from './game/Simulation';
export type { SimulationOptions, ShipSnapshot, AircraftSnapshot } from './game/Simulation';
export { MeshLease, RecordingSceneHost } from './rendering/SceneHost';
export type { SceneHost, MeshHandle, MeshRecord, ViewportOptions } from './rendering/SceneHost';
export { PlacementSystem } from './rendering/PlacementSystem';
