/**
 * =============================================================================
 * VECTOR2.TS - Vettore 2D immutabile per la simulazione
 * =============================================================================
 * Ogni operazione restituisce un nuovo vettore.
 */

export interface Point2 {
    readonly x: number;
    readonly y: number;
}

export class Vector2 implements Point2 {
    public static readonly ZERO = new Vector2(0, 0);
    public static readonly UNIT_X = new Vector2(1, 0);

    constructor(public readonly x: number = 0, public readonly y: number = 0) {}

    static from(point: Point2): Vector2 {
        return point instanceof Vector2 ? point : new Vector2(point.x, point.y);
    }

    /**
     * Versore della direzione `angle` (radianti)
     */
    static fromAngle(angle: number): Vector2 {
        return new Vector2(Math.cos(angle), Math.sin(angle));
    }

    add(other: Point2): Vector2 {
        return new Vector2(this.x + other.x, this.y + other.y);
    }

    subtract(other: Point2): Vector2 {
        return new Vector2(this.x - other.x, this.y - other.y);
    }

    negate(): Vector2 {
        return new Vector2(-this.x, -this.y);
    }

    scale(factor: number): Vector2 {
        return new Vector2(this.x * factor, this.y * factor);
    }

    length(): number {
        return Math.sqrt(this.x * this.x + this.y * this.y);
    }

    distanceTo(other: Point2): number {
        return this.subtract(other).length();
    }

    /**
     * Con lunghezza zero il risultato è (NaN, NaN): il chiamante deve gestirlo.
     */
    normalized(): Vector2 {
        const length = this.length();
        return new Vector2(this.x / length, this.y / length);
    }

    rotated(angle: number): Vector2 {
        const cos = Math.cos(angle);
        const sin = Math.sin(angle);
        return new Vector2(cos * this.x - sin * this.y, sin * this.x + cos * this.y);
    }

    isFinite(): boolean {
        return Number.isFinite(this.x) && Number.isFinite(this.y);
    }

    equals(other: Point2, epsilon: number = 0): boolean {
        return Math.abs(this.x - other.x) <= epsilon && Math.abs(this.y - other.y) <= epsilon;
    }

    /**
     * Prodotto scalare dei vettori NORMALIZZATI, cioè il coseno dell'angolo
     * tra `a` e `b` in [-1, 1]. Non è il prodotto scalare grezzo.
     */
    static dot(a: Point2, b: Point2): number {
        const na = Vector2.from(a).normalized();
        const nb = Vector2.from(b).normalized();
        return na.x * nb.x + na.y * nb.y;
    }

    /**
     * Angolo con segno (radianti) per ruotare `a` su `b`: -atan2(cross, dot)
     * calcolato sui versori. Positivo quando `b` sta in senso orario rispetto ad `a`.
     */
    static angleRad(a: Point2, b: Point2): number {
        const na = Vector2.from(a).normalized();
        const nb = Vector2.from(b).normalized();
        return -Math.atan2(na.x * nb.y - na.y * nb.x, na.x * nb.x + na.y * nb.y);
    }

    /**
     * Componente z del prodotto vettoriale, sui vettori grezzi
     */
    static cross(a: Point2, b: Point2): number {
        return a.x * b.y - a.y * b.x;
    }

    toString(): string {
        return `Vector2(${this.x}, ${this.y})`;
    }
}

export default Vector2;
