/**
 * =============================================================================
 * SIMULATION.TS - Facade della simulazione portaerei + velivoli
 * =============================================================================
 * Monta World, EventBus e sistemi per una portaerei. L'host chiama update(dt)
 * una volta per tick e inoltra tasti e click.
 */

import { World } from '../engine/ecs/World';
import { EntityId } from '../engine/ecs/types';
import { EventBus } from '../engine/events/EventBus';
import { InputSystem, InputActionType, PointerButton, DEFAULT_KEY_BINDINGS } from '../engine/systems/InputSystem';
import { CarrierSystem, CarrierSpawnOptions } from '../engine/systems/CarrierSystem';
import { FlightSystem } from '../engine/systems/FlightSystem';
import { MovementSystem } from '../engine/systems/MovementSystem';
import { ApproachPhaseType } from '../engine/systems/SteeringBehaviors';
import { PlacementSystem } from '../rendering/PlacementSystem';
import { SceneHost } from '../rendering/SceneHost';
import { FlightPhaseType } from './components/Flight';
import { SimulationParams, SimulationParamsOverrides, createSimulationParams } from './config/SimulationParams';
import { GoalPoint, createGoal } from './Goal';
import type { SimulationEvents } from './events';

export interface SimulationOptions {
    scene: SceneHost;
    params?: SimulationParamsOverrides;
    carrier?: CarrierSpawnOptions;
    /** Se presente, l'obiettivo viene impostato e il marker posizionato subito */
    goal?: { x: number; y: number };
    keyBindings?: Readonly<Record<string, InputActionType>>;
}

export interface ShipSnapshot {
    id: EntityId;
    x: number;
    y: number;
    angle: number;
    clock: number;
    aircraft: readonly EntityId[];
    refillTimers: readonly number[];
    capacity: number;
}

export interface AircraftSnapshot {
    id: EntityId;
    x: number;
    y: number;
    angle: number;
    vx: number;
    vy: number;
    age: number;
    phase: FlightPhaseType;
    approach: ApproachPhaseType | null;
}

export class Simulation {
    public readonly params: SimulationParams;
    public readonly events: EventBus<SimulationEvents>;
    public readonly world: World;
    public readonly carrierId: EntityId;

    private readonly _scene: SceneHost;
    private readonly _goal: GoalPoint;
    private readonly _input: InputSystem;
    private readonly _carrierSystem: CarrierSystem;
    private readonly _flightSystem: FlightSystem;

    private _time: number;
    private _disposed: boolean;

    constructor(options: SimulationOptions) {
        this.params = createSimulationParams(options.params);
        this.events = new EventBus<SimulationEvents>();
        this.world = new World(this.events);

        this._scene = options.scene;
        this._goal = createGoal();
        this._time = 0;
        this._disposed = false;

        this._input = this.world.registerSystem(new InputSystem(options.keyBindings ?? DEFAULT_KEY_BINDINGS));
        this._carrierSystem = this.world.registerSystem(
            new CarrierSystem(this.params, this._input, this._scene, this._goal)
        );
        this._flightSystem = this.world.registerSystem(new FlightSystem(this.params, this._goal));
        this.world.registerSystem(new MovementSystem());
        this.world.registerSystem(new PlacementSystem());

        this.carrierId = this._carrierSystem.spawnCarrier(options.carrier);

        if (options.goal) {
            this._carrierSystem.setGoal(options.goal.x, options.goal.y);
        }

        console.log(
            `[Simulation] Pronta - capacità ${this.params.ship.capacity}, ` +
            `raggio di atterraggio ${this.params.landingRadius.toFixed(3)}`
        );
    }

    /**
     * Un passo di simulazione di deltaTime secondi
     */
    update(deltaTime: number): void {
        this._assertAlive();
        if (!Number.isFinite(deltaTime) || deltaTime <= 0) {
            throw new Error(`deltaTime deve essere un numero > 0, ricevuto ${deltaTime}`);
        }

        this.world.tick(deltaTime);
        this._time += deltaTime;
    }

    keyPressed(code: string): void {
        this._assertAlive();
        this._input.keyPressed(code);
    }

    keyReleased(code: string): void {
        this._assertAlive();
        this._input.keyReleased(code);
    }

    /**
     * Click in coordinate schermo: sinistro sposta l'obiettivo, destro lancia un velivolo
     */
    mouseClicked(screenX: number, screenY: number, isLeftButton: boolean): void {
        this._assertAlive();
        const position = this._scene.screenToWorld(screenX, screenY);
        this._input.pointerClicked(position.x, position.y, isLeftButton ? PointerButton.LEFT : PointerButton.RIGHT);
    }

    setGoal(x: number, y: number): void {
        this._assertAlive();
        this._carrierSystem.setGoal(x, y);
    }

    launchAircraft(): EntityId | null {
        this._assertAlive();
        return this._carrierSystem.launchAircraft(this.carrierId);
    }

    get goal(): Readonly<GoalPoint> {
        return { x: this._goal.x, y: this._goal.y };
    }

    get time(): number {
        return this._time;
    }

    get flight(): FlightSystem {
        return this._flightSystem;
    }

    get ship(): ShipSnapshot {
        const carrier = this.world.components.require(this.carrierId, 'Carrier');
        const transform = this.world.components.require(this.carrierId, 'Transform');

        return {
            id: this.carrierId,
            x: transform.x,
            y: transform.y,
            angle: transform.rotation,
            clock: carrier.clock,
            aircraft: [...carrier.aircraft],
            refillTimers: [...carrier.refillTimers],
            capacity: carrier.capacity
        };
    }

    get aircraft(): AircraftSnapshot[] {
        const snapshots: AircraftSnapshot[] = [];

        for (const id of this.world.queryEntities(['Flight', 'Transform', 'Velocity'])) {
            const flight = this.world.components.require(id, 'Flight');
            const transform = this.world.components.require(id, 'Transform');
            const velocity = this.world.components.require(id, 'Velocity');

            snapshots.push({
                id,
                x: transform.x,
                y: transform.y,
                angle: transform.rotation,
                vx: velocity.vx,
                vy: velocity.vy,
                age: flight.age,
                phase: flight.phase,
                approach: flight.approach
            });
        }

        return snapshots;
    }

    get isDisposed(): boolean {
        return this._disposed;
    }

    /**
     * Distrugge il World; le mesh ancora vive vengono rilasciate
     */
    dispose(): void {
        this._assertAlive();

        this.world.destroy();
        this.events.clear();
        this._disposed = true;

        console.log(`[Simulation] Chiusa dopo ${this._time.toFixed(2)}s simulati`);
    }

    private _assertAlive(): void {
        if (this._disposed) {
            throw new Error('Simulazione già chiusa');
        }
    }
}

export default Simulation;
