/**
 * =============================================================================
 * GOAL.TS - Obiettivo comune orbitato dai velivoli
 * =============================================================================
 * Un solo oggetto per simulazione, passato esplicitamente ai sistemi che lo
 * leggono o lo spostano.
 */

export interface GoalPoint {
    x: number;
    y: number;
}

export function createGoal(x: number = 0, y: number = 0): GoalPoint {
    return { x, y };
}

export default createGoal;
