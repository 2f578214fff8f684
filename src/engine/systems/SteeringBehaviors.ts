/**
 * =============================================================================
 * STEERING-BEHAVIORS.TS - Leggi di guida dei velivoli
 * =============================================================================
 * Include: correzione di velocità, orbita attorno all'obiettivo,
 * avvicinamento in tre fasi alla portaerei.
 *
 * Tutte le funzioni sono pure: la fase di atterraggio è ricalcolata a ogni
 * tick dalla sola geometria, nessuno stato viene conservato qui.
 */

import { Point2, Vector2 } from '../math/Vector2';

/** Sotto questa distanza dall'intersezione il velivolo è allineato alla rotta della nave */
export const ALIGNMENT_EPSILON = 0.01;

export const ApproachPhase = {
    /** Fase 1: avvicinamento alla normale della rotta della nave */
    ALIGN: 1,
    /** Fase 2: virata per immettersi sulla rotta della nave */
    SWING: 2,
    /** Fase 3: diretti sulla nave */
    FINAL: 3
} as const;

export type ApproachPhaseType = typeof ApproachPhase[keyof typeof ApproachPhase];

export interface SteeringConfig {
    maxSpeed: number;
    landingSpeed: number;
    landingRadius: number;
    targetRadius: number;
    angularSpeed: number;
}

export interface LandingApproach {
    phase: ApproachPhaseType;
    destination: Vector2;
    /** null solo se le due rette sono parallele */
    intersection: Vector2 | null;
    distanceToIntersection: number;
}

export class SteeringBehaviors {
    private readonly config: Readonly<SteeringConfig>;

    constructor(config: SteeringConfig) {
        this.config = { ...config };
    }

    get landingRadius(): number {
        return this.config.landingRadius;
    }

    /**
     * Legge di sterzata: dalla direzione grezza verso la destinazione alla
     * correzione di velocità V_MAX * dir - v.
     */
    correctedDestination(destination: Point2, velocity: Point2): Vector2 {
        const corrected = this.correctClosingToTarget(Vector2.from(destination), velocity);

        // Elimina la componente di velocità che non aiuta e punta alla velocità massima
        return corrected.normalized().scale(this.config.maxSpeed).subtract(velocity);
    }

    /**
     * Se il velivolo è vicino e si avvicina troppo in fretta, inverte la
     * destinazione per perdere velocità invece di superare il bersaglio.
     *
     * La "proiezione" è |cos(v, d) * v|, non la proiezione scalare classica.
     */
    correctClosingToTarget(destination: Vector2, velocity: Point2): Vector2 {
        if (destination.length() <= this.config.landingRadius) {
            const projection = Vector2.from(velocity).scale(Vector2.dot(velocity, destination)).length();

            if (projection > this.config.landingSpeed) {
                return destination.negate();
            }
        }
        return destination;
    }

    /**
     * Punta a un punto sulla circonferenza di raggio targetRadius, a 90° dalla
     * congiungente velivolo-obiettivo. Ricalcolato a ogni tick, produce l'orbita.
     */
    orbitDestination(goal: Point2, position: Point2): Vector2 {
        const toGoal = Vector2.from(goal).subtract(position);
        const waypoint = toGoal
            .rotated(Math.PI / 2)
            .normalized()
            .scale(this.config.targetRadius)
            .add(goal);

        return waypoint.subtract(position);
    }

    landingApproach(carrierPosition: Point2, carrierAngle: number, position: Point2): LandingApproach {
        const shipPosition = Vector2.from(carrierPosition);
        const current = Vector2.from(position);
        const forward = Vector2.UNIT_X.rotated(carrierAngle);
        const forwardNormal = forward.rotated(Math.PI / 2);

        const intersection = lineIntersection(shipPosition, forward, current, forwardNormal);
        if (!intersection) {
            return {
                phase: ApproachPhase.FINAL,
                destination: shipPosition.subtract(current),
                intersection: null,
                distanceToIntersection: 0
            };
        }

        const distance = intersection.distanceTo(current);
        const radius = this.config.landingRadius;

        if (distance > ALIGNMENT_EPSILON) {
            if (distance > radius) {
                return {
                    phase: ApproachPhase.ALIGN,
                    destination: current.subtract(intersection).normalized().scale(radius).add(intersection).subtract(current),
                    intersection,
                    distanceToIntersection: distance
                };
            }

            // Intersezione sulla nave: la direzione di virata non esiste, si punta alla nave
            const alongCourse = shipPosition.subtract(intersection);
            if (alongCourse.length() > ALIGNMENT_EPSILON) {
                return {
                    phase: ApproachPhase.SWING,
                    destination: alongCourse.normalized().scale(radius).add(intersection).subtract(current),
                    intersection,
                    distanceToIntersection: distance
                };
            }
        }

        return {
            phase: ApproachPhase.FINAL,
            destination: shipPosition.subtract(current),
            intersection,
            distanceToIntersection: distance
        };
    }

    /**
     * Rotazione da applicare alla prua in questo tick, limitata a
     * ±angularSpeed * dt. Con un angolo non finito (destinazione nulla) non ruota.
     */
    rotationToward(destination: Point2, heading: number, deltaTime: number): number {
        const targetAngle = Vector2.angleRad(destination, Vector2.fromAngle(heading));
        if (!Number.isFinite(targetAngle)) {
            return 0;
        }

        const maxRotation = this.config.angularSpeed * deltaTime;
        if (targetAngle > 0) {
            return Math.min(maxRotation, targetAngle);
        }
        return Math.max(-maxRotation, targetAngle);
    }
}

/**
 * Intersezione delle rette p1 + n*v1 e p2 + k*v2 (regola di Cramer).
 * Funziona anche con v1 verticale; restituisce null per rette parallele.
 */
export function lineIntersection(p1: Point2, v1: Point2, p2: Point2, v2: Point2): Vector2 | null {
    const denominator = Vector2.cross(v1, v2);
    if (Math.abs(denominator) < 1e-12) {
        return null;
    }

    const offset = Vector2.from(p2).subtract(p1);
    const k = Vector2.cross(offset, v1) / denominator;

    return Vector2.from(v2).scale(k).add(p2);
}

export default SteeringBehaviors;
