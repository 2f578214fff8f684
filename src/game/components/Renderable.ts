/**
 * =============================================================================
 * RENDERABLE.TS - Componente che lega un'entità alla sua mesh sulla scena
 * =============================================================================
 */

import { BaseComponent } from '../../engine/ecs/types';
import { MeshLease } from '../../rendering/SceneHost';

export const MeshKind = {
    SHIP: 'ship',
    AIRCRAFT: 'aircraft'
} as const;

export type MeshKindType = typeof MeshKind[keyof typeof MeshKind];

export interface RenderableComponent extends BaseComponent {
    kind: MeshKindType;
    mesh: MeshLease;
}

export function createRenderable(kind: MeshKindType, mesh: MeshLease): RenderableComponent {
    return { kind, mesh };
}

export default createRenderable;
