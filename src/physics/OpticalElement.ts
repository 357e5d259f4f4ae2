import { Matrix3, Vector2 } from 'three';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_WAVELENGTH, TERMINATED } from './types';
import type { ElementKind, Intersection, Point2, RayState } from './types';
import { isTerminated } from './angles';
import { applyTransform, createTransform, invertTransform } from './transform';

export interface Surface {
    intersect(ray: RayState): Intersection;
    propagate(ray: RayState, wavelength?: number): RayState;
}

/**
 * Planar optical element. The element surface is the local line x = 0,
 * clipped to |y| < aperture / 2.
 *
 * Geometry is fixed at construction: to move or tilt an element, build a new one.
 * Variants supply only their angle law; intersection and clipping are shared.
 */
export abstract class OpticalElement implements Surface {
    abstract readonly kind: ElementKind;

    readonly id: string;
    readonly name: string | undefined;
    readonly aperture: number; // full width
    readonly theta: number;    // rad, relative to global Y

    private readonly _position: Vector2;
    private readonly _worldToLocal: Matrix3;
    private readonly _localToWorld: Matrix3;

    constructor(aperture: number, position: Point2, theta: number, name?: string) {
        this.id = uuidv4();
        this.name = name;
        this.aperture = aperture;
        this.theta = theta;
        this._position = new Vector2(position.x, position.y);
        this._worldToLocal = createTransform(theta, this._position);
        this._localToWorld = invertTransform(this._worldToLocal);
    }

    get position(): Vector2 {
        return this._position.clone();
    }

    get worldToLocal(): Matrix3 {
        return this._worldToLocal.clone();
    }

    get localToWorld(): Matrix3 {
        return this._localToWorld.clone();
    }

    /**
     * Outgoing angle for a ray that hit the element.
     * @param incomingAngle global angle of the incoming ray, not offset by theta
     * @param localPoint hit point in the element frame
     */
    abstract angleLaw(incomingAngle: number, localPoint: Vector2, wavelength: number): number;

    intersect(ray: RayState): Intersection {
        const [x, y, angle] = ray;

        if (isTerminated(angle)) {
            return { status: 'terminated' };
        }

        const origin = applyTransform(this._worldToLocal, { x, y });
        const localAngle = angle + this.theta;

        const localPoint = new Vector2(0, origin.y - origin.x * Math.tan(localAngle));
        const point = applyTransform(this._localToWorld, localPoint);

        // Strict: a point exactly on the rim is a miss. NaN also misses.
        const inside = Math.abs(localPoint.y) < this.aperture / 2;

        return { status: inside ? 'hit' : 'missed', point, localPoint };
    }

    propagate(ray: RayState, wavelength: number = DEFAULT_WAVELENGTH): RayState {
        const hit = this.intersect(ray);

        switch (hit.status) {
            case 'terminated':
                return TERMINATED;
            case 'missed':
                // Keep the miss position so the partial path stays drawable.
                return [hit.point.x, hit.point.y, NaN];
            case 'hit':
                return [hit.point.x, hit.point.y, this.angleLaw(ray[2], hit.localPoint, wavelength)];
        }
    }
}
