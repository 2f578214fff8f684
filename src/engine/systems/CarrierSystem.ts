/**
 * =============================================================================
 * CARRIER-SYSTEM.TS - Controllo della portaerei e comandi del giocatore
 * =============================================================================
 * Include: velocità da input, integrazione dell'angolo, delta del tick per i
 * velivoli in decollo, timer di ricarica, lancio velivoli e obiettivo.
 *
 * La posizione è integrata dal MovementSystem; qui si aggiorna solo la
 * velocità, così i velivoli in decollo leggono la posa di inizio tick.
 */

import System from '../ecs/System';
import { EntityId, IWorld } from '../ecs/types';
import { Vector2 } from '../math/Vector2';
import { InputSystem, InputAction, PointerButton } from './InputSystem';
import { CarrierComponent, createCarrier, occupiedSlots, hasFreeSlot } from '../../game/components/Carrier';
import { createTransform, getPosition } from '../../game/components/Transform';
import { createVelocity, getVelocity, setVelocity } from '../../game/components/Velocity';
import { createFlight } from '../../game/components/Flight';
import { createRenderable, MeshKind } from '../../game/components/Renderable';
import { SimulationParams } from '../../game/config/SimulationParams';
import { GoalPoint } from '../../game/Goal';
import { MeshLease, SceneHost } from '../../rendering/SceneHost';

export interface CarrierSpawnOptions {
    x?: number;
    y?: number;
    angle?: number;
}

export class CarrierSystem extends System {
    private _params: SimulationParams;
    private _input: InputSystem;
    private _scene: SceneHost;
    private _goal: GoalPoint;

    constructor(params: SimulationParams, input: InputSystem, scene: SceneHost, goal: GoalPoint) {
        super('CarrierSystem', 90);

        this._params = params;
        this._input = input;
        this._scene = scene;
        this._goal = goal;
    }

    init(world: IWorld): void {
        super.init(world);

        this.on('input:pointer', ({ x, y, button }) => {
            if (button === PointerButton.LEFT) {
                this.setGoal(x, y);
            } else {
                this._launchFromFirstCarrier();
            }
        });

        console.log('[CarrierSystem] Inizializzato');
    }

    /**
     * Crea l'entità portaerei con la sua mesh
     */
    spawnCarrier(options: CarrierSpawnOptions = {}): EntityId {
        const world = this.requireWorld;
        const entityId = world.createEntity('carrier');

        world.addComponent(entityId, 'Transform', createTransform({
            x: options.x ?? 0,
            y: options.y ?? 0,
            rotation: options.angle ?? 0
        }));
        world.addComponent(entityId, 'Velocity', createVelocity());
        world.addComponent(entityId, 'Carrier', createCarrier({ capacity: this._params.ship.capacity }));
        world.addComponent(entityId, 'Renderable', createRenderable(
            MeshKind.SHIP,
            new MeshLease(this._scene, this._scene.createShipMesh())
        ));

        console.log(`[CarrierSystem] Portaerei ${entityId} creata in (${options.x ?? 0}, ${options.y ?? 0})`);

        return entityId;
    }

    update(deltaTime: number): void {
        for (const entityId of this.queryEntities(['Carrier', 'Transform', 'Velocity'])) {
            this._updateCarrier(entityId, deltaTime);
        }
    }

    private _updateCarrier(entityId: EntityId, deltaTime: number): void {
        const world = this.requireWorld;
        const carrier = world.getComponent(entityId, 'Carrier');
        const transform = world.getComponent(entityId, 'Transform');
        const velocity = world.getComponent(entityId, 'Velocity');
        if (!carrier || !transform || !velocity) return;

        carrier.clock += deltaTime;

        const ship = this._params.ship;

        // Avanti ha la precedenza su indietro, sinistra su destra
        let linearSpeed = 0;
        if (this._input.isActionPressed(InputAction.THRUST_FORWARD)) {
            linearSpeed = ship.linearSpeed;
        } else if (this._input.isActionPressed(InputAction.THRUST_BACKWARD)) {
            linearSpeed = -ship.linearSpeed;
        }

        // Si vira solo in movimento
        let angularSpeed = 0;
        if (linearSpeed !== 0) {
            if (this._input.isActionPressed(InputAction.ROTATE_LEFT)) {
                angularSpeed = ship.angularSpeed;
            } else if (this._input.isActionPressed(InputAction.ROTATE_RIGHT)) {
                angularSpeed = -ship.angularSpeed;
            }
        }

        carrier.linearSpeed = linearSpeed;
        carrier.angularSpeed = angularSpeed;

        carrier.deltaRotation = angularSpeed * deltaTime;
        transform.rotation += carrier.deltaRotation;

        const previousVelocity = getVelocity(velocity);
        const newVelocity = Vector2.fromAngle(transform.rotation).scale(linearSpeed);
        setVelocity(velocity, newVelocity);

        carrier.deltaVelocity = newVelocity.subtract(previousVelocity);
        carrier.deltaPosition = newVelocity.scale(deltaTime);

        this._expireRefillTimers(entityId, carrier);
    }

    private _expireRefillTimers(entityId: EntityId, carrier: CarrierComponent): void {
        const refillTime = this._params.ship.refillTime;
        const before = carrier.refillTimers.length;

        carrier.refillTimers = carrier.refillTimers.filter(startedAt => carrier.clock < startedAt + refillTime);

        if (carrier.refillTimers.length < before) {
            this.emit('carrier:refilled', {
                carrierId: entityId,
                available: carrier.capacity - occupiedSlots(carrier)
            });
        }
    }

    /**
     * Sposta l'obiettivo comune e il suo marker
     */
    setGoal(x: number, y: number): void {
        this._goal.x = x;
        this._goal.y = y;
        this._scene.placeGoalMarker(x, y);
        this.emit('goal:set', { x, y });

        console.log(`[CarrierSystem] Obiettivo in (${x.toFixed(2)}, ${y.toFixed(2)})`);
    }

    /**
     * Lancia un velivolo dalla posa attuale della portaerei.
     * @returns l'id del velivolo, o null se non ci sono slot liberi
     */
    launchAircraft(carrierId: EntityId): EntityId | null {
        const world = this.requireWorld;
        const carrier = world.getComponent(carrierId, 'Carrier');
        const transform = world.getComponent(carrierId, 'Transform');
        const velocity = world.getComponent(carrierId, 'Velocity');
        if (!carrier || !transform || !velocity) {
            throw new Error(`Entità ${carrierId} non è una portaerei`);
        }

        if (!hasFreeSlot(carrier)) {
            this.emit('aircraft:launch-rejected', {
                carrierId,
                airborne: carrier.aircraft.length,
                refilling: carrier.refillTimers.length,
                capacity: carrier.capacity
            });
            console.warn(
                `[CarrierSystem] Lancio rifiutato: ${carrier.aircraft.length} in volo, ` +
                `${carrier.refillTimers.length} in ricarica (capacità ${carrier.capacity})`
            );
            return null;
        }

        const position = getPosition(transform);
        const entityId = world.createEntity('aircraft');

        world.addComponent(entityId, 'Transform', createTransform({
            x: position.x,
            y: position.y,
            rotation: transform.rotation
        }));
        // Parte con la velocità della nave, come se fosse appoggiato sul ponte
        world.addComponent(entityId, 'Velocity', createVelocity({ vx: velocity.vx, vy: velocity.vy }));
        world.addComponent(entityId, 'Flight', createFlight({ carrierId }));
        world.addComponent(entityId, 'Renderable', createRenderable(
            MeshKind.AIRCRAFT,
            new MeshLease(this._scene, this._scene.createAircraftMesh())
        ));

        carrier.aircraft.push(entityId);

        this.emit('aircraft:launched', {
            entityId,
            carrierId,
            x: position.x,
            y: position.y,
            rotation: transform.rotation
        });
        console.log(`[CarrierSystem] Velivolo ${entityId} lanciato (${occupiedSlots(carrier)}/${carrier.capacity})`);

        return entityId;
    }

    private _launchFromFirstCarrier(): void {
        const [carrierId] = this.queryEntities(['Carrier']);
        if (carrierId === undefined) {
            console.warn('[CarrierSystem] Nessuna portaerei da cui lanciare');
            return;
        }
        this.launchAircraft(carrierId);
    }
}

export default CarrierSystem;
