import { Mirror } from '../physics/components/Mirror';
import { DEFAULT_WAVELENGTH } from '../physics/types';
import type { TraceScene } from '../physics/types';

/**
 * Single Mirror — one horizontal 200-wide mirror at y=-100, spanning x ∈ [0, 200].
 * The ray enters from the upper left and lands near the middle of the mirror.
 */
export function createSingleMirrorScene(): TraceScene {
    return {
        elements: [
            new Mirror(200, { x: 100, y: -100 }, Math.PI / 2),
        ],
        rays: [
            [-20, 100, -Math.PI / 3],
        ],
        wavelength: DEFAULT_WAVELENGTH,
    };
}
