import { DEFAULT_WAVELENGTH } from './types';
import type { RayBundle, RayState } from './types';
import type { OpticalElement } from './OpticalElement';
import { assertRayState } from './errors';
import { isTerminated } from './angles';

/**
 * Sequential tracer: every ray visits every element exactly once, in list order.
 * Unlike a nearest-hit solver there is no search, so a bundle always has
 * elements.length + 1 states.
 */
export class SequentialTracer {
    readonly elements: readonly OpticalElement[];

    constructor(elements: readonly OpticalElement[]) {
        this.elements = elements;
    }

    trace(rays: readonly RayState[], wavelength: number = DEFAULT_WAVELENGTH): RayBundle[] {
        const bundles: RayBundle[] = [];

        rays.forEach((ray, index) => {
            assertRayState(ray, index);
            bundles.push(this.traceOne(ray, index, wavelength));
        });

        return bundles;
    }

    private traceOne(ray: RayState, index: number, wavelength: number): RayBundle {
        const [x, y, angle] = ray;
        if (!isTerminated(angle) && ![x, y, angle].every(Number.isFinite)) {
            console.warn(`SequentialTracer: Ray ${index} has a non-finite origin or angle. It will terminate at the first element.`, ray);
        }

        const bundle: RayBundle = [[x, y, angle]];
        let current: RayState = bundle[0];

        for (const element of this.elements) {
            current = element.propagate(current, wavelength);
            bundle.push(current);
        }

        return bundle;
    }
}

/**
 * Propagate each ray through `elements` in order.
 * Returns one bundle per ray, in input order; neither input is mutated.
 */
export function propagateRays(
    elements: readonly OpticalElement[],
    rays: readonly RayState[],
    wavelength: number = DEFAULT_WAVELENGTH
): RayBundle[] {
    return new SequentialTracer(elements).trace(rays, wavelength);
}
