import type { Vector2 } from 'three';
import type { OpticalElement } from './OpticalElement';

// --- Coordinate Systems ---
// Global Space: 2D plane, angles in radians measured from +X, wrapped to (-π, π].
// Local Space (Element): origin at the element position, element plane is x = 0.

export interface Point2 {
    x: number;
    y: number;
}

/** Position and propagation angle of a ray at one point along its path. */
export type RayState = readonly [x: number, y: number, angle: number];

/** States of one ray: the input followed by the state after each element. */
export type RayBundle = RayState[];

/** Absorbing sentinel for a ray that terminated upstream. */
export const TERMINATED: RayState = Object.freeze([NaN, NaN, NaN] as const);

/** Visible green, in meters. */
export const DEFAULT_WAVELENGTH = 525e-9;

export type ElementKind = 'mirror';

export type Intersection =
    | { status: 'terminated' }
    | { status: 'missed'; point: Vector2; localPoint: Vector2 }
    | { status: 'hit'; point: Vector2; localPoint: Vector2 };

export interface TraceScene {
    elements: OpticalElement[];
    rays: RayState[];
    wavelength: number;
}
