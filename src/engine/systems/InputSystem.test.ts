import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InputSystem, InputAction, PointerButton } from './InputSystem';
import { World } from '../ecs/World';
import { EventBus } from '../events/EventBus';
import type { SimulationEvents } from '../../game/events';

describe('InputSystem', () => {
    let events: EventBus<SimulationEvents>;
    let input: InputSystem;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        events = new EventBus<SimulationEvents>();
        input = new World(events).registerSystem(new InputSystem());
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('pressed e released solo al primo e all\'ultimo tasto dell\'azione', () => {
        const pressed = vi.fn();
        const released = vi.fn();
        events.on('input:action:pressed', pressed);
        events.on('input:action:released', released);

        input.keyPressed('KeyW');
        input.keyPressed('ArrowUp');
        input.keyReleased('KeyW');

        expect(input.isActionPressed(InputAction.THRUST_FORWARD)).toBe(true);
        expect(released).not.toHaveBeenCalled();

        input.keyReleased('ArrowUp');

        expect(input.isActionPressed(InputAction.THRUST_FORWARD)).toBe(false);
        expect(pressed).toHaveBeenCalledTimes(1);
        expect(pressed).toHaveBeenCalledWith({ action: InputAction.THRUST_FORWARD, keyCode: 'KeyW' });
        expect(released).toHaveBeenCalledWith({ action: InputAction.THRUST_FORWARD, keyCode: 'ArrowUp' });
    });

    it('la ripetizione automatica non conta come secondo tasto', () => {
        input.keyPressed('KeyA');
        input.keyPressed('KeyA');
        input.keyReleased('KeyA');

        expect(input.isActionPressed(InputAction.ROTATE_LEFT)).toBe(false);
    });

    it('ignora il rilascio di un tasto mai premuto e i tasti non associati', () => {
        input.keyPressed('KeyD');
        input.keyReleased('ArrowRight');
        input.keyPressed('Space');

        expect(input.isActionPressed(InputAction.ROTATE_RIGHT)).toBe(true);
    });

    it('inoltra i click come input:pointer', () => {
        const pointer = vi.fn();
        events.on('input:pointer', pointer);

        input.pointerClicked(2, -3, PointerButton.RIGHT);

        expect(pointer).toHaveBeenCalledWith({ x: 2, y: -3, button: PointerButton.RIGHT });
    });
});
