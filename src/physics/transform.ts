import { Matrix3, Vector2, Vector3 } from 'three';
import type { Point2 } from './types';

/**
 * Homogeneous global → local transform H = R·T.
 *
 * T translates by -position, R rotates by theta:
 *
 *   R = | cos θ  -sin θ  0 |      T = | 1  0  -px |
 *       | sin θ   cos θ  0 |          | 0  1  -py |
 *       |   0       0    1 |          | 0  0   1  |
 */
export function createTransform(theta: number, position: Point2): Matrix3 {
    const c = Math.cos(theta);
    const s = Math.sin(theta);

    const rotation = new Matrix3().set(
        c, -s, 0,
        s, c, 0,
        0, 0, 1
    );
    const translation = new Matrix3().set(
        1, 0, -position.x,
        0, 1, -position.y,
        0, 0, 1
    );

    return rotation.multiply(translation);
}

/** Exact matrix inverse, so that H·H⁻¹ = I up to rounding. */
export function invertTransform(h: Matrix3): Matrix3 {
    return h.clone().invert();
}

export function applyTransform(h: Matrix3, point: Point2): Vector2 {
    const p = new Vector3(point.x, point.y, 1).applyMatrix3(h);
    return new Vector2(p.x, p.y);
}
