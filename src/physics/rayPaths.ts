import { Color, SRGBColorSpace } from 'three';
import type { Point2, RayBundle } from './types';
import { isTerminated } from './angles';
import { InvalidInputError } from './errors';

export type RandomSource = () => number;

export interface ViewExtent {
    xlim: [number, number];
    ylim: [number, number];
}

export interface PolylineOptions {
    /** One color per bundle. Generated from `random` when omitted. */
    colors?: readonly string[];
    random?: RandomSource;
    /** When set, the last live segment is extended across the view. */
    extent?: ViewExtent;
}

export interface RayPolyline {
    color: string;
    points: Point2[];
}

export function randomColor(random: RandomSource): string {
    const color = new Color().setRGB(random(), random(), random(), SRGBColorSpace);
    return `#${color.getHexString(SRGBColorSpace)}`;
}

/**
 * Convert ray bundles to polylines for a renderer.
 *
 * A line stops at the first terminated state. A miss still has a position,
 * so the segment up to the miss point is kept.
 */
export function toPolylines(bundles: readonly RayBundle[], options: PolylineOptions = {}): RayPolyline[] {
    const { colors, random = Math.random, extent } = options;

    if (colors && colors.length !== bundles.length) {
        throw new InvalidInputError(`Need same number of colors as rays (${colors.length} colors, ${bundles.length} rays)`);
    }

    return bundles.map((bundle, index) => ({
        color: colors ? colors[index] : randomColor(random),
        points: bundlePoints(bundle, extent),
    }));
}

function bundlePoints(bundle: RayBundle, extent: ViewExtent | undefined): Point2[] {
    const points: Point2[] = [];

    for (const [x, y, angle] of bundle) {
        if (!Number.isFinite(x) || !Number.isFinite(y)) break;
        points.push({ x, y });
        if (isTerminated(angle)) return points;
    }

    const last = bundle[points.length - 1];
    if (extent && last !== undefined && points.length === bundle.length) {
        // Long enough to leave the view from any point inside it.
        const reach = Math.hypot(extent.xlim[1] - extent.xlim[0], extent.ylim[1] - extent.ylim[0]);
        const [x, y, angle] = last;
        points.push({ x: x + reach * Math.cos(angle), y: y + reach * Math.sin(angle) });
    }

    return points;
}
