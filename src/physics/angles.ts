const TWO_PI = 2 * Math.PI;

/**
 * Wrap an angle into (-π, π]. Idempotent for values already in range.
 * NaN stays NaN so terminated states pass through untouched.
 */
export function wrapAngle(angle: number): number {
    let wrapped = angle % TWO_PI;
    if (wrapped > Math.PI) {
        wrapped -= TWO_PI;
    } else if (wrapped <= -Math.PI) {
        wrapped += TWO_PI;
    }
    return wrapped;
}

/** A state is terminated when its angle is NaN. Never compare against NaN directly. */
export function isTerminated(angle: number): boolean {
    return Number.isNaN(angle);
}
