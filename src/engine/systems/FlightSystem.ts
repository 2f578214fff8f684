/**
 * =============================================================================
 * FLIGHT-SYSTEM.TS - Ciclo di vita e guida dei velivoli
 * =============================================================================
 * Decollo agganciato alla nave, orbita attorno all'obiettivo, rientro con
 * avvicinamento in tre fasi e appontaggio.
 */

import System from '../ecs/System';
import { EntityId, IWorld } from '../ecs/types';
import { Vector2 } from '../math/Vector2';
import { SteeringBehaviors, ApproachPhaseType } from './SteeringBehaviors';
import { FlightComponent, FlightPhase, resolveFlightPhase } from '../../game/components/Flight';
import { TransformComponent, getPosition, setPosition } from '../../game/components/Transform';
import { VelocityComponent, getVelocity, setVelocity } from '../../game/components/Velocity';
import { SimulationParams } from '../../game/config/SimulationParams';
import { GoalPoint } from '../../game/Goal';

/**
 * Quello che un velivolo può leggere della sua portaerei.
 * L'angolo è già quello di fine tick; la posizione è ancora quella di
 * inizio tick, la traslazione del tick è deltaPosition.
 */
export interface CarrierView {
    readonly position: Vector2;
    readonly angle: number;
    readonly deltaRotation: number;
    readonly deltaPosition: Vector2;
    readonly deltaVelocity: Vector2;
}

export interface AircraftState {
    transform: TransformComponent;
    velocity: VelocityComponent;
    flight: FlightComponent;
}

export class FlightSystem extends System {
    private _params: SimulationParams;
    private _goal: GoalPoint;
    private _steering: SteeringBehaviors;

    constructor(params: SimulationParams, goal: GoalPoint) {
        super('FlightSystem', 70);

        this._params = params;
        this._goal = goal;
        this._steering = new SteeringBehaviors({
            maxSpeed: params.aircraft.linearSpeed,
            landingSpeed: params.aircraft.landingSpeed,
            landingRadius: params.landingRadius,
            targetRadius: params.aircraft.targetRadius,
            angularSpeed: params.aircraft.angularSpeed
        });
    }

    init(world: IWorld): void {
        super.init(world);
        console.log(`[FlightSystem] Inizializzato - raggio di atterraggio ${this._params.landingRadius.toFixed(3)}`);
    }

    get steering(): SteeringBehaviors {
        return this._steering;
    }

    update(deltaTime: number): void {
        for (const entityId of this.queryEntities(['Flight', 'Transform', 'Velocity'])) {
            this._processAircraft(entityId, deltaTime);
        }
    }

    private _processAircraft(entityId: EntityId, deltaTime: number): void {
        const world = this.requireWorld;
        const flight = world.getComponent(entityId, 'Flight');
        const transform = world.getComponent(entityId, 'Transform');
        const velocity = world.getComponent(entityId, 'Velocity');
        if (!flight || !transform || !velocity) return;

        const carrier = world.getComponent(flight.carrierId, 'Carrier');
        const carrierTransform = world.getComponent(flight.carrierId, 'Transform');
        if (!carrier || !carrierTransform || !world.entityExists(flight.carrierId)) {
            console.warn(`[FlightSystem] Velivolo ${entityId} senza portaerei ${flight.carrierId}, rimosso`);
            world.destroyEntity(entityId);
            return;
        }

        const view: CarrierView = {
            position: getPosition(carrierTransform),
            angle: carrierTransform.rotation,
            deltaRotation: carrier.deltaRotation,
            deltaPosition: carrier.deltaPosition,
            deltaVelocity: carrier.deltaVelocity
        };

        if (this.updateAircraft(entityId, { transform, velocity, flight }, view, deltaTime)) {
            return;
        }

        // Appontato: lo slot resta occupato finché il timer di ricarica non scade
        world.destroyEntity(entityId);
        carrier.aircraft = carrier.aircraft.filter(id => id !== entityId);
        carrier.refillTimers.push(carrier.clock);

        this.emit('aircraft:landed', { entityId, carrierId: flight.carrierId, refillStartedAt: carrier.clock });
        console.log(`[FlightSystem] Velivolo ${entityId} appontato dopo ${flight.age.toFixed(2)}s`);
    }

    /**
     * Un tick di un singolo velivolo.
     * @returns false quando il velivolo è rientrato e va rimosso
     */
    updateAircraft(entityId: EntityId, aircraft: AircraftState, carrier: CarrierView, deltaTime: number): boolean {
        const { transform, velocity, flight } = aircraft;
        const { takeoffTime, liveTime } = this._params.aircraft;
        const position = getPosition(transform);
        // Posizione della nave a fine tick, allineata all'angolo già ruotato
        const carrierPosition = carrier.position.add(carrier.deltaPosition);

        if (flight.age >= liveTime && position.distanceTo(carrierPosition) <= this._params.ship.size) {
            return false;
        }

        if (flight.age < takeoffTime) {
            this._carryWithCarrier(aircraft, carrier);
        } else {
            const destination = flight.age < liveTime
                ? this._steering.orbitDestination(this._goal, position)
                : this._landingDestination(entityId, flight, carrierPosition, carrier.angle, position);

            const corrected = this._steering.correctedDestination(destination, getVelocity(velocity));
            transform.rotation += this._steering.rotationToward(corrected, transform.rotation, deltaTime);

            this._accelerate(transform, velocity, deltaTime);
        }

        flight.age += deltaTime;
        this._updatePhase(entityId, flight);

        return true;
    }

    /**
     * Decollo: solidale alla nave. La traslazione del tick arriva dal
     * MovementSystem, perché la velocità segue quella della nave.
     */
    private _carryWithCarrier(aircraft: AircraftState, carrier: CarrierView): void {
        const { transform, velocity } = aircraft;

        transform.rotation = carrier.angle;

        const offset = getPosition(transform).subtract(carrier.position);
        setPosition(transform, offset.rotated(carrier.deltaRotation).add(carrier.position));

        setVelocity(velocity, getVelocity(velocity).add(carrier.deltaVelocity));
    }

    private _landingDestination(
        entityId: EntityId,
        flight: FlightComponent,
        carrierPosition: Vector2,
        carrierAngle: number,
        position: Vector2
    ): Vector2 {
        const approach = this._steering.landingApproach(carrierPosition, carrierAngle, position);

        if (approach.phase !== flight.approach) {
            flight.approach = approach.phase;
            this._emitApproach(entityId, approach.phase, approach.distanceToIntersection);
        }

        return approach.destination;
    }

    private _emitApproach(entityId: EntityId, phase: ApproachPhaseType, distanceToIntersection: number): void {
        this.emit('aircraft:approach', { entityId, phase, distanceToIntersection });
    }

    /**
     * Accelera lungo la prua, senza superare la velocità massima
     */
    private _accelerate(transform: TransformComponent, velocity: VelocityComponent, deltaTime: number): void {
        const { acceleration, linearSpeed } = this._params.aircraft;

        let next = getVelocity(velocity).add(Vector2.fromAngle(transform.rotation).scale(acceleration * deltaTime));
        if (next.length() > linearSpeed) {
            next = next.normalized().scale(linearSpeed);
        }

        setVelocity(velocity, next);
    }

    private _updatePhase(entityId: EntityId, flight: FlightComponent): void {
        const { takeoffTime, liveTime } = this._params.aircraft;
        const phase = resolveFlightPhase(flight.age, takeoffTime, liveTime);

        if (phase !== flight.phase) {
            const from = flight.phase;
            flight.phase = phase;
            this.emit('aircraft:phase', { entityId, from, to: phase });

            if (phase === FlightPhase.RETURNING) {
                console.log(`[FlightSystem] Velivolo ${entityId} rientra`);
            }
        }
    }
}

export default FlightSystem;
