import type { Vector2 } from 'three';
import { OpticalElement } from '../OpticalElement';
import { wrapAngle } from '../angles';
import type { Point2 } from '../types';

export class Mirror extends OpticalElement {
    readonly kind = 'mirror';

    /** Pass `null` as the name for an unlabelled mirror. */
    constructor(aperture: number, position: Point2, theta: number, name: string | null = "Mirror") {
        super(aperture, position, theta, name ?? undefined);
    }

    /**
     * Flat mirror reflection: θ_out = π − θ_in − 2θ.
     *
     * Takes the global incoming angle; intersect() works with θ_in + θ instead.
     * The two disagree for tilted mirrors and must stay that way.
     */
    angleLaw(incomingAngle: number, _localPoint: Vector2, _wavelength: number): number {
        return wrapAngle(Math.PI - incomingAngle - 2 * this.theta);
    }
}
