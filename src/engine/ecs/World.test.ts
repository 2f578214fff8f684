import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { World } from './World';
import { System } from './System';
import { EventBus } from '../events/EventBus';
import { createTransform, createVelocity } from '../../game/components';
import type { SimulationEvents } from '../../game/events';

class RecordingSystem extends System {
    constructor(name: string, priority: number, private readonly _calls: string[], private readonly _fail: boolean = false) {
        super(name, priority);
    }

    update(_deltaTime: number): void {
        this._calls.push(this.name);
        if (this._fail) {
            throw new Error(`${this.name} guasto`);
        }
    }
}

function createWorld(): World {
    return new World(new EventBus<SimulationEvents>());
}

describe('World', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('assegna id crescenti per World, partendo da 1', () => {
        const first = createWorld();
        const second = createWorld();

        expect(first.createEntity()).toBe(1);
        expect(first.createEntity()).toBe(2);
        expect(second.createEntity()).toBe(1);
    });

    it('queryEntities restituisce solo chi ha tutti i componenti', () => {
        const world = createWorld();
        const moving = world.createEntity();
        const still = world.createEntity();

        world.addComponent(moving, 'Transform', createTransform());
        world.addComponent(moving, 'Velocity', createVelocity({ vx: 1 }));
        world.addComponent(still, 'Transform', createTransform());

        expect(world.queryEntities(['Transform', 'Velocity'])).toEqual([moving]);
        expect(world.queryEntities(['Transform'])).toEqual([moving, still]);
    });

    it('un\'entità distrutta sparisce subito dalle query, i componenti a fine tick', () => {
        const world = createWorld();
        const destroying = vi.fn();
        const destroyed: number[] = [];
        world.on('entity:destroying', destroying);
        world.on('entity:destroyed', ({ entityId }) => destroyed.push(entityId));

        const entity = world.createEntity('aircraft');
        world.addComponent(entity, 'Transform', createTransform({ x: 4 }));

        expect(world.destroyEntity(entity)).toBe(true);
        expect(world.destroyEntity(entity)).toBe(false);
        expect(destroying).toHaveBeenCalledTimes(1);
        expect(destroying).toHaveBeenCalledWith({ entityId: entity, tag: 'aircraft' });
        expect(world.entityExists(entity)).toBe(false);
        expect(world.queryEntities(['Transform'])).toEqual([]);
        expect(world.getComponent(entity, 'Transform')?.x).toBe(4);

        world.tick(0.1);

        expect(world.getComponent(entity, 'Transform')).toBeUndefined();
        expect(destroyed).toEqual([entity]);
    });

    it('addComponent su entità inesistente o distrutta lancia', () => {
        const world = createWorld();
        expect(() => world.addComponent(99, 'Transform', createTransform())).toThrow('99');

        const entity = world.createEntity();
        world.destroyEntity(entity);
        expect(() => world.addComponent(entity, 'Transform', createTransform())).toThrow(`entità ${entity}`);
    });

    it('esegue i sistemi in ordine di priorità decrescente, a pari priorità per registrazione', () => {
        const world = createWorld();
        const calls: string[] = [];

        world.registerSystem(new RecordingSystem('basso', 10, calls));
        world.registerSystem(new RecordingSystem('alto', 100, calls));
        world.registerSystem(new RecordingSystem('medio', 50, calls));
        world.registerSystem(new RecordingSystem('medio-bis', 50, calls));

        world.tick(0.1);

        expect(calls).toEqual(['alto', 'medio', 'medio-bis', 'basso']);
        expect(world.systems.order).toEqual(['alto', 'medio', 'medio-bis', 'basso']);
    });

    it('un sistema che lancia non ferma gli altri', () => {
        const world = createWorld();
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const calls: string[] = [];

        world.registerSystem(new RecordingSystem('guasto', 100, calls, true));
        world.registerSystem(new RecordingSystem('sano', 10, calls));

        world.tick(0.1);

        expect(calls).toEqual(['guasto', 'sano']);
        expect(world.systems.failures).toBe(1);
        expect(error).toHaveBeenCalledTimes(1);
    });

    it('rifiuta due sistemi con lo stesso nome', () => {
        const world = createWorld();
        world.registerSystem(new RecordingSystem('doppio', 1, []));
        expect(() => world.registerSystem(new RecordingSystem('doppio', 2, []))).toThrow('doppio');
    });

    it('alla distruzione stacca i listener dei sistemi e rifiuta altri tick', () => {
        const bus = new EventBus<SimulationEvents>();
        const world = new World(bus);
        const system = world.registerSystem(new RecordingSystem('ascolto', 1, []));

        system.on('goal:set', vi.fn());
        expect(bus.listenerCount('goal:set')).toBe(1);

        world.destroy();

        expect(bus.listenerCount('goal:set')).toBe(0);
        expect(world.isDestroyed).toBe(true);
        expect(() => world.tick(0.1)).toThrow('distrutto');
    });
});
