import { describe, expect, test } from "vitest";
import { Matrix3 } from "three";
import { applyTransform, createTransform, invertTransform } from "../transform";

function expectIdentity(m: Matrix3) {
    const identity = new Matrix3().identity();
    m.elements.forEach((value, i) => {
        expect(value).toBeCloseTo(identity.elements[i], 9);
    });
}

const PLACEMENTS: [number, { x: number; y: number }][] = [
    [0, { x: 0, y: 0 }],
    [Math.PI / 2, { x: 100, y: -100 }],
    [-Math.PI / 3, { x: 300, y: 0 }],
    [2.5, { x: -42.5, y: 17.25 }],
    [Math.PI, { x: 1e3, y: -1e3 }],
];

describe("Geometry Transform", () => {
    test.each(PLACEMENTS)("H·H⁻¹ and H⁻¹·H are identity (theta=%s)", (theta, position) => {
        const h = createTransform(theta, position);
        const hInv = invertTransform(h);

        expectIdentity(new Matrix3().multiplyMatrices(h, hInv));
        expectIdentity(new Matrix3().multiplyMatrices(hInv, h));
    });

    test("Element position maps to the local origin", () => {
        const h = createTransform(0.7, { x: 12, y: -8 });
        const local = applyTransform(h, { x: 12, y: -8 });
        expect(local.x).toBeCloseTo(0, 12);
        expect(local.y).toBeCloseTo(0, 12);
    });

    test("Zero rotation is a pure translation", () => {
        const h = createTransform(0, { x: 2, y: 3 });
        const local = applyTransform(h, { x: 5, y: 7 });
        expect(local.x).toBeCloseTo(3, 12);
        expect(local.y).toBeCloseTo(4, 12);
    });

    test("Translation is applied before rotation", () => {
        // (125, 100) relative to (100, -100) is (25, 200); rotating by π/2 gives (-200, 25)
        const h = createTransform(Math.PI / 2, { x: 100, y: -100 });
        const local = applyTransform(h, { x: 125, y: 100 });
        expect(local.x).toBeCloseTo(-200, 9);
        expect(local.y).toBeCloseTo(25, 9);
    });

    test("Inverse maps local points back to global", () => {
        const h = createTransform(Math.PI / 2, { x: 100, y: -100 });
        const global = applyTransform(invertTransform(h), { x: 0, y: 40 });
        expect(global.x).toBeCloseTo(140, 9);
        expect(global.y).toBeCloseTo(-100, 9);
    });

    test("invertTransform leaves its argument untouched", () => {
        const h = createTransform(1.2, { x: 3, y: 4 });
        const before = [...h.elements];
        invertTransform(h);
        expect(h.elements).toEqual(before);
    });
});
