import type { RayState } from './types';

/** Caller error: the inputs themselves are inconsistent, not the optics. */
export class InvalidInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

export class InvalidRayError extends InvalidInputError {
    readonly index: number;

    constructor(index: number, message: string) {
        super(`Ray ${index}: ${message}`);
        this.name = 'InvalidRayError';
        this.index = index;
    }
}

export function isRayState(value: unknown): value is RayState {
    return Array.isArray(value)
        && value.length === 3
        && value.every((v: unknown) => typeof v === 'number');
}

/** Throws InvalidRayError unless `value` is an [x, y, angle] triple of numbers. */
export function assertRayState(value: unknown, index: number): asserts value is RayState {
    if (!Array.isArray(value)) {
        throw new InvalidRayError(index, 'expected an [x, y, angle] array');
    }
    if (value.length !== 3) {
        throw new InvalidRayError(index, `expected 3 components, got ${value.length}`);
    }
    if (!isRayState(value)) {
        throw new InvalidRayError(index, 'components must be numbers');
    }
}
