import { describe, it, expect } from 'vitest';
import { Vector2 } from './Vector2';

const SAMPLES = [
    new Vector2(3, 4),
    new Vector2(-2.5, 0.75),
    new Vector2(0, -7),
    new Vector2(1e-3, 2e-3),
    new Vector2(120, -45)
];

const ANGLES = [0, 0.3, Math.PI / 2, -1.2, Math.PI, 5.5];

describe('Vector2', () => {
    it('operazioni aritmetiche restituiscono nuovi vettori', () => {
        const a = new Vector2(1, 2);
        const b = new Vector2(3, -1);

        expect(a.add(b)).toEqual(new Vector2(4, 1));
        expect(a.subtract(b)).toEqual(new Vector2(-2, 3));
        expect(a.negate()).toEqual(new Vector2(-1, -2));
        expect(a.scale(3)).toEqual(new Vector2(3, 6));
        expect(a).toEqual(new Vector2(1, 2));
    });

    it('length e distanceTo', () => {
        expect(new Vector2(3, 4).length()).toBe(5);
        expect(new Vector2(1, 1).distanceTo(new Vector2(4, 5))).toBe(5);
    });

    it('normalized ha lunghezza 1 per ogni vettore non nullo', () => {
        for (const v of SAMPLES) {
            expect(v.normalized().length()).toBeCloseTo(1, 12);
        }
    });

    it('normalized del vettore nullo produce NaN senza lanciare', () => {
        const n = Vector2.ZERO.normalized();
        expect(Number.isNaN(n.x)).toBe(true);
        expect(Number.isNaN(n.y)).toBe(true);
        expect(n.isFinite()).toBe(false);
    });

    it('rotated preserva la lunghezza', () => {
        for (const v of SAMPLES) {
            for (const angle of ANGLES) {
                expect(v.rotated(angle).length()).toBeCloseTo(v.length(), 9);
            }
        }
    });

    it('rotazioni successive si compongono', () => {
        for (const v of SAMPLES) {
            const composed = v.rotated(0.7).rotated(-2.1);
            const direct = v.rotated(0.7 - 2.1);
            expect(composed.equals(direct, 1e-9)).toBe(true);
        }
    });

    it('rotated di 90° gira in senso antiorario', () => {
        const r = Vector2.UNIT_X.rotated(Math.PI / 2);
        expect(r.x).toBeCloseTo(0, 15);
        expect(r.y).toBe(1);
    });

    it('dot è il coseno tra i versori, non il prodotto scalare grezzo', () => {
        expect(Vector2.dot(new Vector2(2, 0), new Vector2(0, 3))).toBe(0);
        expect(Vector2.dot(new Vector2(3, 0), new Vector2(-5, 0))).toBe(-1);
        expect(Vector2.dot(new Vector2(4, 4), new Vector2(10, 0))).toBeCloseTo(Math.SQRT1_2, 12);
    });

    it('angleRad è positivo quando il secondo vettore è in senso orario rispetto al primo', () => {
        // (0,1) rispetto a (1,0): per portare la prua su (0,1) si ruota di +90°
        expect(Vector2.angleRad(new Vector2(0, 1), new Vector2(1, 0))).toBeCloseTo(Math.PI / 2, 12);
        expect(Vector2.angleRad(new Vector2(0, -1), new Vector2(1, 0))).toBeCloseTo(-Math.PI / 2, 12);
        expect(Vector2.angleRad(new Vector2(5, 0), new Vector2(2, 0))).toBeCloseTo(0, 12);
    });

    it('angleRad non dipende dalle lunghezze', () => {
        const a = Vector2.angleRad(new Vector2(1, 2), new Vector2(3, -1));
        const b = Vector2.angleRad(new Vector2(10, 20), new Vector2(0.3, -0.1));
        expect(b).toBeCloseTo(a, 12);
    });

    it('cross è la componente z sui vettori grezzi', () => {
        expect(Vector2.cross(new Vector2(2, 0), new Vector2(0, 3))).toBe(6);
        expect(Vector2.cross(new Vector2(0, 3), new Vector2(2, 0))).toBe(-6);
    });

    it('fromAngle e from', () => {
        const v = Vector2.fromAngle(Math.PI);
        expect(v.x).toBe(-1);
        expect(v.y).toBeCloseTo(0, 15);

        const existing = new Vector2(1, 1);
        expect(Vector2.from(existing)).toBe(existing);
        expect(Vector2.from({ x: 2, y: 3 })).toEqual(new Vector2(2, 3));
    });
});
