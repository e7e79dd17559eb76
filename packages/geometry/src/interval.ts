/**
 * a half-open range of integer indices, [min, max)
 */
export type Interval = {
    min: number;
    max: number;
};

export function interval(min: number, max: number): Interval {
    return { min, max };
}

/**
 * @returns the number of indices in the interval. note this value may be negative for a malformed interval
 */
export function size(i: Interval) {
    return i.max - i.min;
}

/**
 * @returns true iff x is an index inside the interval (inclusive of min, exclusive of max)
 */
export function within(i: Interval, x: number): boolean {
    return i.min <= x && x < i.max;
}

/**
 * @returns true iff inner lies entirely inside outer. Empty intervals lie inside anything that contains their position.
 */
export function contains(outer: Interval, inner: Interval): boolean {
    return inner.min >= outer.min && inner.max <= outer.max && inner.min <= inner.max;
}

export function isIntegerInterval(i: Interval) {
    return Number.isSafeInteger(i.min) && Number.isSafeInteger(i.max);
}

/**
 * @returns x, clamped into [interval.min, interval.max]. Note that max itself is a legal result, so that
 * a clamped value can serve as the stop of a range.
 */
export function limit(i: Interval, x: number) {
    return Math.min(Math.max(x, i.min), i.max);
}
