/**
 * =============================================================================
 * SCENE-HOST.TS - Confine verso l'host grafico
 * =============================================================================
 * La simulazione non disegna nulla: crea e distrugge mesh, ne comunica la
 * posa e sposta il marker dell'obiettivo. Il resto è compito dell'host.
 */

import type { Point2 } from '../engine/math/Vector2';
import type { MeshKindType } from '../game/components/Renderable';

/** Handle opaco restituito dall'host */
export type MeshHandle = number | string | object;

export interface SceneHost {
    createShipMesh(): MeshHandle;
    createAircraftMesh(): MeshHandle;
    destroyMesh(handle: MeshHandle): void;
    placeMesh(handle: MeshHandle, x: number, y: number, angle: number): void;
    placeGoalMarker(x: number, y: number): void;
    screenToWorld(x: number, y: number): Point2;
}

/**
 * Possesso esclusivo di una mesh: release() la distrugge una volta sola
 */
export class MeshLease {
    private _released: boolean;

    constructor(private readonly _scene: SceneHost, public readonly handle: MeshHandle) {
        this._released = false;
    }

    get released(): boolean {
        return this._released;
    }

    place(x: number, y: number, angle: number): void {
        if (this._released) {
            throw new Error('Mesh già rilasciata, impossibile posizionarla');
        }
        this._scene.placeMesh(this.handle, x, y, angle);
    }

    /**
     * @returns false se la mesh era già stata rilasciata
     */
    release(): boolean {
        if (this._released) {
            return false;
        }
        this._released = true;
        this._scene.destroyMesh(this.handle);
        return true;
    }
}

export interface MeshRecord {
    id: number;
    kind: MeshKindType;
    x: number;
    y: number;
    angle: number;
    placeCount: number;
    destroyCount: number;
}

export interface ViewportOptions {
    /** Pixel per unità di mondo */
    scale?: number;
    originX?: number;
    originY?: number;
    /** Asse y dello schermo verso il basso */
    flipY?: boolean;
}

/**
 * Host in memoria: registra tutto ciò che la simulazione gli chiede.
 * Usato dai test e dalla demo senza grafica.
 */
export class RecordingSceneHost implements SceneHost {
    public readonly goalMarkers: Array<{ x: number; y: number }>;

    private _meshes: Map<number, MeshRecord>;
    private _nextId: number;
    private _scale: number;
    private _originX: number;
    private _originY: number;
    private _flipY: boolean;

    constructor(viewport: ViewportOptions = {}) {
        this.goalMarkers = [];
        this._meshes = new Map();
        this._nextId = 1;
        this._scale = viewport.scale ?? 1;
        this._originX = viewport.originX ?? 0;
        this._originY = viewport.originY ?? 0;
        this._flipY = viewport.flipY ?? false;
    }

    createShipMesh(): MeshHandle {
        return this._create('ship');
    }

    createAircraftMesh(): MeshHandle {
        return this._create('aircraft');
    }

    destroyMesh(handle: MeshHandle): void {
        this._require(handle).destroyCount++;
    }

    placeMesh(handle: MeshHandle, x: number, y: number, angle: number): void {
        const record = this._require(handle);
        record.x = x;
        record.y = y;
        record.angle = angle;
        record.placeCount++;
    }

    placeGoalMarker(x: number, y: number): void {
        this.goalMarkers.push({ x, y });
    }

    screenToWorld(x: number, y: number): Point2 {
        const worldY = this._flipY ? this._originY - y : y - this._originY;
        return {
            x: (x - this._originX) / this._scale,
            y: worldY / this._scale
        };
    }

    getMesh(handle: MeshHandle): MeshRecord | undefined {
        return typeof handle === 'number' ? this._meshes.get(handle) : undefined;
    }

    /**
     * Mesh create e non ancora distrutte
     */
    liveMeshes(kind?: MeshKindType): MeshRecord[] {
        return Array.from(this._meshes.values()).filter(
            record => record.destroyCount === 0 && (kind === undefined || record.kind === kind)
        );
    }

    get meshCount(): number {
        return this._meshes.size;
    }

    private _create(kind: MeshKindType): number {
        const id = this._nextId++;
        this._meshes.set(id, { id, kind, x: 0, y: 0, angle: 0, placeCount: 0, destroyCount: 0 });
        return id;
    }

    private _require(handle: MeshHandle): MeshRecord {
        const record = this.getMesh(handle);
        if (!record) {
            throw new Error(`Mesh sconosciuta: ${String(handle)}`);
        }
        return record;
    }
}

export default RecordingSceneHost;
