import { describe, expect, test } from "vitest";
import { ELEMENT_TYPES, createElement, getTypeName } from "../ElementRegistry";
import { Mirror } from "../components/Mirror";

describe("ElementRegistry", () => {
    test("Mirror is registered", () => {
        expect(ELEMENT_TYPES).toEqual(["Mirror"]);
    });

    test("createElement builds the registered type", () => {
        const element = createElement("Mirror", {
            aperture: 300,
            position: { x: 100, y: -100 },
            theta: Math.PI / 2,
            name: "Floor",
        });

        expect(element).toBeInstanceOf(Mirror);
        expect(element?.name).toBe("Floor");
        expect(element?.aperture).toBe(300);
        expect(element?.position.toArray()).toEqual([100, -100]);
        expect(element?.theta).toBe(Math.PI / 2);
    });

    test("Unknown types yield null", () => {
        expect(createElement("Grating", { aperture: 1, position: { x: 0, y: 0 }, theta: 0 })).toBeNull();
    });

    test("getTypeName resolves instances", () => {
        expect(getTypeName(new Mirror(1, { x: 0, y: 0 }, 0))).toBe("Mirror");
    });
});
