import { Mirror } from '../physics/components/Mirror';
import { DEFAULT_WAVELENGTH } from '../physics/types';
import type { TraceScene } from '../physics/types';

/**
 * Periscope — two mirrors in series.
 *
 * Beam path:
 *   rays falling from y=100 → horizontal mirror at y=-100 → vertical mirror at x=300
 *
 * The second ray reflects off the first mirror to the left and misses the second.
 */
export function createPeriscopeScene(): TraceScene {
    return {
        elements: [
            new Mirror(300, { x: 100, y: -100 }, Math.PI / 2, "Floor Mirror"),
            new Mirror(300, { x: 300, y: 0 }, 0, "Wall Mirror"),
        ],
        rays: [
            [125, 100, -Math.PI / 3],
            [75, 100, -Math.PI * 2 / 3],
        ],
        wavelength: DEFAULT_WAVELENGTH,
    };
}
