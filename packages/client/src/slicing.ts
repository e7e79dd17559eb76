import { BoundsError, UnsupportedSliceError } from '@cutout/core';
import { interval, limit, within } from '@cutout/geometry';

/**
 * stands for as many full-range axes as are needed to give the slicing one item per axis
 */
export const ELLIPSIS: unique symbol = Symbol('...');

/**
 * a start:stop:step range on one axis. null stands for "from the beginning", "to the end" and "step of 1".
 * Structurally the same as zarrita's `Slice`, so `zarr.slice(...)` results may be used as well.
 */
export type SliceRange = {
    start: number | null;
    stop: number | null;
    step: number | null;
};

/**
 * - a SliceRange selects a range on its axis
 * - a number selects a single index and removes the axis from the result
 * - null selects the whole axis
 */
export type SliceItem = SliceRange | number | null | typeof ELLIPSIS;

export type Slicing = SliceItem | ReadonlyArray<SliceItem>;

/**
 * build a range. A single argument is the stop, and the range then starts at the beginning of the axis
 * @example slice(10) // [0, 10)
 * @example slice(10, 110) // [10, 110)
 * @example slice(-5, null) // the last five
 */
export function slice(startOrStop: number | null, stop?: number | null, step?: number | null): SliceRange {
    if (stop === undefined) {
        return { start: null, stop: startOrStop, step: null };
    }
    return { start: startOrStop, stop, step: step ?? null };
}

export type ResolvedSlicing = {
    offset: number[];
    shape: number[];
    // axes selected by a single index, which are dropped from a read result
    reduced: boolean[];
};

function isRange(item: SliceItem): item is SliceRange {
    return typeof item === 'object' && item !== null;
}

/**
 * @returns one item per axis: the ellipsis (if any) is replaced by whole-axis items, and missing trailing axes are filled in
 * @throws UnsupportedSliceError if there is more than one ellipsis, or more items than axes
 */
export function expandSlicing(slicing: Slicing, rank: number): Exclude<SliceItem, typeof ELLIPSIS>[] {
    const items: ReadonlyArray<SliceItem> = Array.isArray(slicing) ? slicing : [slicing];
    const ellipses = items.filter((item) => item === ELLIPSIS).length;
    if (ellipses > 1) {
        throw new UnsupportedSliceError('a slicing may contain at most one ellipsis');
    }
    const explicit = items.length - ellipses;
    if (explicit > rank) {
        throw new UnsupportedSliceError(`too many indices: ${explicit} given for ${rank} axes`);
    }
    const expanded: Exclude<SliceItem, typeof ELLIPSIS>[] = [];
    for (const item of items) {
        if (item === ELLIPSIS) {
            for (let i = 0; i < rank - explicit; i += 1) {
                expanded.push(null);
            }
        } else {
            expanded.push(item);
        }
    }
    while (expanded.length < rank) {
        expanded.push(null);
    }
    return expanded;
}

function checkInteger(value: number, what: string) {
    if (!Number.isSafeInteger(value)) {
        throw new UnsupportedSliceError(`${what} must be an integer, got ${value}`);
    }
}

// negative positions count back from the end, then positions are clamped into the axis
function normalizeBound(value: number | null, fallback: number, size: number) {
    if (value === null) {
        return fallback;
    }
    checkInteger(value, 'slice bounds');
    return limit(interval(0, size), value < 0 ? value + size : value);
}

/**
 * turn a slicing of a volume of the given shape into the offset and shape of the region it selects
 * @throws UnsupportedSliceError for a step other than 1, non-integer bounds, or a malformed slicing
 * @throws BoundsError for a single index outside of its axis
 */
export function resolveSlicing(slicing: Slicing, volumeShape: ReadonlyArray<number>): ResolvedSlicing {
    const items = expandSlicing(slicing, volumeShape.length);
    const offset: number[] = [];
    const shape: number[] = [];
    const reduced: boolean[] = [];
    items.forEach((item, axis) => {
        const size = volumeShape[axis];
        if (typeof item === 'number') {
            checkInteger(item, 'an index');
            const index = item < 0 ? item + size : item;
            if (!within(interval(0, size), index)) {
                throw new BoundsError(`index ${item} is out of range for axis ${axis} of size ${size}`);
            }
            offset.push(index);
            shape.push(1);
            reduced.push(true);
            return;
        }
        if (isRange(item) && item.step !== null && item.step !== 1) {
            throw new UnsupportedSliceError(`only a step of 1 is supported, got ${item.step} on axis ${axis}`);
        }
        const start = normalizeBound(isRange(item) ? item.start : null, 0, size);
        const stop = normalizeBound(isRange(item) ? item.stop : null, size, size);
        offset.push(start);
        shape.push(Math.max(stop - start, 0));
        reduced.push(false);
    });
    return { offset, shape, reduced };
}

/**
 * @returns the shape of the array a resolved slicing reads, with single-index axes removed
 */
export function resultShape(resolved: ResolvedSlicing): number[] {
    return resolved.shape.filter((_, axis) => !resolved.reduced[axis]);
}
