/**
 * ElementRegistry — maps element type names to their constructors.
 *
 * The scene serializer goes through here for both directions, so a new
 * element variant is registered once and becomes loadable and savable.
 */
import type { OpticalElement } from './OpticalElement';
import { Mirror } from './components/Mirror';
import type { Point2 } from './types';

export const DEFAULT_APERTURE = 25;

export interface ElementParams {
    aperture: number;
    position: Point2;
    theta: number;
    /** Omitted: the type's default label. `null`: no label. */
    name?: string | null;
}

/** Registry entry for an element type. */
export interface ElementEntry {
    ctor: new (...args: never[]) => OpticalElement;
    create(params: ElementParams): OpticalElement;
}

const REGISTRY: [string, ElementEntry][] = [
    ['Mirror', {
        ctor: Mirror,
        create: ({ aperture, position, theta, name }) => new Mirror(aperture, position, theta, name),
    }],
];

const BY_NAME = new Map<string, ElementEntry>(REGISTRY);

/** All registered type names, in registration order. */
export const ELEMENT_TYPES: readonly string[] = REGISTRY.map(([name]) => name);

export function createElement(type: string, params: ElementParams): OpticalElement | null {
    const entry = BY_NAME.get(type);
    return entry ? entry.create(params) : null;
}

export function getTypeName(element: OpticalElement): string | null {
    for (const [name, entry] of REGISTRY) {
        if (element instanceof entry.ctor) return name;
    }
    return null;
}
