import { contains, type Interval, interval, isIntegerInterval, size } from './interval';

type Coordinates = ReadonlyArray<number>;

/**
 * an axis-aligned, half-open region of an N-dimensional index space: every axis i spans [start[i], stop[i])
 */
export type boxND = {
    readonly start: Coordinates;
    readonly stop: Coordinates;
};

const create = (start: Coordinates, stop: Coordinates): boxND => ({ start: [...start], stop: [...stop] });

const fromOffsetShape = (offset: Coordinates, shape: Coordinates): boxND =>
    create(offset, offset.map((o, i) => o + shape[i]));

const rank = (b: boxND) => b.start.length;

const axis = (b: boxND, i: number): Interval => ({ min: b.start[i], max: b.stop[i] });

const shape = (b: boxND): number[] => b.start.map((s, i) => size(axis(b, i)));

const voxelCount = (b: boxND) => shape(b).reduce((count, n) => count * n, 1);

const isEmpty = (b: boxND) => voxelCount(b) === 0;

/**
 * @returns true iff start and stop have the same rank, are all integers, and start <= stop on every axis
 */
const isValid = (b: boxND) =>
    b.start.length === b.stop.length &&
    b.start.every((_, i) => isIntegerInterval(axis(b, i)) && size(axis(b, i)) >= 0);

/**
 * @returns true iff the box is valid, has the same rank as the given extent, and fits inside [0, extent)
 */
const isWithin = (b: boxND, extent: Coordinates) =>
    isValid(b) && rank(b) === extent.length && extent.every((n, i) => contains(interval(0, n), axis(b, i)));

/**
 * reorder the axes of a box
 * @param order result axis i is taken from input axis order[i]
 */
const permute = (b: boxND, order: ReadonlyArray<number>): boxND =>
    create(order.map((from) => b.start[from]), order.map((from) => b.stop[from]));

/**
 * @returns a copy of the box, restricted on one axis to [from, to) relative to the box's own start on that axis
 */
const slab = (b: boxND, along: number, from: number, to: number): boxND =>
    create(
        b.start.map((s, i) => (i === along ? s + from : s)),
        b.stop.map((s, i) => (i === along ? b.start[i] + to : s)),
    );

export const BoxND = {
    create,
    fromOffsetShape,
    rank,
    axis,
    shape,
    voxelCount,
    isEmpty,
    isValid,
    isWithin,
    permute,
    slab,
} as const;
