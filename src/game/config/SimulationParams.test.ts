import { describe, it, expect } from 'vitest';
import {
    AIRCRAFT_PARAMS,
    SHIP_PARAMS,
    calculateLandingRadius,
    createSimulationParams
} from './SimulationParams';

describe('SimulationParams', () => {
    it('raggio di atterraggio con i parametri di default', () => {
        // π / 2.5 * 2.5 per la virata, (2.5 - 2.5/1.5)² / 0.3 / 2 per il rallentamento
        expect(calculateLandingRadius(AIRCRAFT_PARAMS)).toBeCloseTo(4.299000060997201, 12);
    });

    it('createSimulationParams senza override usa i preset', () => {
        const params = createSimulationParams();

        expect(params.ship).toEqual(SHIP_PARAMS);
        expect(params.aircraft).toEqual(AIRCRAFT_PARAMS);
        expect(params.landingRadius).toBe(calculateLandingRadius(AIRCRAFT_PARAMS));
    });

    it('gli override parziali si sommano ai preset e ricalcolano il raggio', () => {
        const params = createSimulationParams({ ship: { capacity: 3 }, aircraft: { angularSpeed: 5 } });

        expect(params.ship.capacity).toBe(3);
        expect(params.ship.refillTime).toBe(SHIP_PARAMS.refillTime);
        expect(params.aircraft.angularSpeed).toBe(5);
        expect(params.landingRadius).toBeCloseTo(calculateLandingRadius(AIRCRAFT_PARAMS) - Math.PI / 2, 12);
    });

    it('i parametri risultanti sono congelati', () => {
        const params = createSimulationParams();
        expect(Object.isFrozen(params.ship)).toBe(true);
        expect(Object.isFrozen(params.aircraft)).toBe(true);
    });

    it('rifiuta valori non positivi o non finiti', () => {
        expect(() => createSimulationParams({ ship: { size: 0 } })).toThrow('ship.size');
        expect(() => createSimulationParams({ aircraft: { acceleration: -1 } })).toThrow('aircraft.acceleration');
        expect(() => createSimulationParams({ ship: { refillTime: Number.POSITIVE_INFINITY } })).toThrow('ship.refillTime');
    });

    it('rifiuta una capacità non intera', () => {
        expect(() => createSimulationParams({ ship: { capacity: 2.5 } })).toThrow('ship.capacity');
    });

    it('la velocità di atterraggio deve essere minore di quella massima', () => {
        expect(() => createSimulationParams({ aircraft: { landingSpeed: 2.5 } })).toThrow('aircraft.landingSpeed');
    });

    it('il decollo non può durare più della vita del velivolo', () => {
        expect(() => createSimulationParams({ aircraft: { takeoffTime: 10, liveTime: 5 } })).toThrow('aircraft.takeoffTime');
    });
});
