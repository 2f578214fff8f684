/**
 * =============================================================================
 * INPUT-SYSTEM.TS - Tasti tenuti premuti e click inoltrati dall'host
 * =============================================================================
 * Nessun listener DOM: l'host chiama keyPressed/keyReleased/pointerClicked.
 * Un'azione è attiva finché almeno uno dei suoi tasti resta premuto; la
 * portaerei la legge a ogni tick.
 */

import System from '../ecs/System';
import { IWorld } from '../ecs/types';

export const InputAction = {
    THRUST_FORWARD: 'thrust_forward',
    THRUST_BACKWARD: 'thrust_backward',
    ROTATE_LEFT: 'rotate_left',
    ROTATE_RIGHT: 'rotate_right'
} as const;

export type InputActionType = typeof InputAction[keyof typeof InputAction];

export const PointerButton = {
    /** Sposta l'obiettivo comune */
    LEFT: 'left',
    /** Lancia un velivolo */
    RIGHT: 'right'
} as const;

export type PointerButtonType = typeof PointerButton[keyof typeof PointerButton];

export const DEFAULT_KEY_BINDINGS: Readonly<Record<string, InputActionType>> = {
    'KeyW': InputAction.THRUST_FORWARD,
    'ArrowUp': InputAction.THRUST_FORWARD,
    'KeyS': InputAction.THRUST_BACKWARD,
    'ArrowDown': InputAction.THRUST_BACKWARD,
    'KeyA': InputAction.ROTATE_LEFT,
    'ArrowLeft': InputAction.ROTATE_LEFT,
    'KeyD': InputAction.ROTATE_RIGHT,
    'ArrowRight': InputAction.ROTATE_RIGHT
};

export class InputSystem extends System {
    private readonly _bindings: ReadonlyMap<string, InputActionType>;
    private _heldKeys: Set<string>;
    /** Tasti premuti per azione */
    private _holders: Map<InputActionType, number>;

    constructor(bindings: Readonly<Record<string, InputActionType>> = DEFAULT_KEY_BINDINGS) {
        super('InputSystem', 100);

        this._bindings = new Map(Object.entries(bindings));
        this._heldKeys = new Set();
        this._holders = new Map();
    }

    init(world: IWorld): void {
        super.init(world);
        console.log(`[InputSystem] ${this._bindings.size} tasti associati ad azioni`);
    }

    /**
     * Lo stato è già aggiornato da keyPressed/keyReleased
     */
    update(_deltaTime: number): void {}

    keyPressed(code: string): void {
        // Ripetizione automatica della tastiera
        if (this._heldKeys.has(code)) return;
        this._heldKeys.add(code);

        const action = this._bindings.get(code);
        if (action === undefined) return;

        const holders = (this._holders.get(action) ?? 0) + 1;
        this._holders.set(action, holders);
        if (holders === 1) {
            this.emit('input:action:pressed', { action, keyCode: code });
        }
    }

    keyReleased(code: string): void {
        if (!this._heldKeys.delete(code)) return;

        const action = this._bindings.get(code);
        if (action === undefined) return;

        const holders = (this._holders.get(action) ?? 1) - 1;
        this._holders.set(action, holders);
        if (holders === 0) {
            this.emit('input:action:released', { action, keyCode: code });
        }
    }

    /**
     * Click già convertito in coordinate mondo, gestito subito e non al tick
     */
    pointerClicked(x: number, y: number, button: PointerButtonType): void {
        this.emit('input:pointer', { x, y, button });
    }

    isActionPressed(action: InputActionType): boolean {
        return (this._holders.get(action) ?? 0) > 0;
    }

    destroy(): void {
        this._heldKeys.clear();
        this._holders.clear();
        super.destroy();
    }
}

export default InputSystem;
