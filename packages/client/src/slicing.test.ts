import { BoundsError, UnsupportedSliceError } from '@cutout/core';
import { describe, expect, it } from 'vitest';
import { ELLIPSIS, expandSlicing, resolveSlicing, resultShape, slice } from './slicing';

const shape = [4, 200, 200, 200];

describe('slice', () => {
    it('treats a single argument as the stop', () => {
        expect(slice(10)).toEqual({ start: null, stop: 10, step: null });
        expect(slice(10, 110)).toEqual({ start: 10, stop: 110, step: null });
        expect(slice(null, null, 1)).toEqual({ start: null, stop: null, step: 1 });
    });
});

describe('expandSlicing', () => {
    it('fills in trailing axes', () => {
        expect(expandSlicing([slice(1, 2)], 3)).toEqual([slice(1, 2), null, null]);
        expect(expandSlicing(5, 2)).toEqual([5, null]);
    });
    it('replaces an ellipsis with as many whole axes as needed', () => {
        expect(expandSlicing([ELLIPSIS, 3], 4)).toEqual([null, null, null, 3]);
        expect(expandSlicing([0, ELLIPSIS, 3], 4)).toEqual([0, null, null, 3]);
        expect(expandSlicing([0, 1, ELLIPSIS, 2, 3], 4)).toEqual([0, 1, 2, 3]);
    });
    it('rejects more than one ellipsis, or more items than axes', () => {
        expect(() => expandSlicing([ELLIPSIS, 0, ELLIPSIS], 4)).toThrow(UnsupportedSliceError);
        expect(() => expandSlicing([0, 0, 0], 2)).toThrow(UnsupportedSliceError);
    });
});

describe('resolveSlicing', () => {
    it('turns ranges into an offset and shape', () => {
        const resolved = resolveSlicing([null, slice(10, 110), slice(20, 120), slice(30, 130)], shape);
        expect(resolved).toEqual({
            offset: [0, 10, 20, 30],
            shape: [4, 100, 100, 100],
            reduced: [false, false, false, false],
        });
    });
    it('reduces axes selected by a single index', () => {
        const resolved = resolveSlicing([1, ELLIPSIS, -1], shape);
        expect(resolved.offset).toEqual([1, 0, 0, 199]);
        expect(resolved.shape).toEqual([1, 200, 200, 1]);
        expect(resultShape(resolved)).toEqual([200, 200]);
    });
    it('counts negative bounds from the end and clamps bounds into the axis', () => {
        expect(resolveSlicing([ELLIPSIS, slice(-10, null)], shape).offset[3]).toBe(190);
        expect(resolveSlicing([ELLIPSIS, slice(-500, 5)], shape).shape[3]).toBe(5);
        expect(resolveSlicing([ELLIPSIS, slice(150, 900)], shape).shape[3]).toBe(50);
        expect(resolveSlicing([ELLIPSIS, slice(300, 400)], shape)).toMatchObject({ offset: [0, 0, 0, 200] });
        expect(resolveSlicing([ELLIPSIS, slice(300, 400)], shape).shape[3]).toBe(0);
    });
    it('selects nothing when the stop comes before the start', () => {
        expect(resolveSlicing([ELLIPSIS, slice(50, 10)], shape).shape).toEqual([4, 200, 200, 0]);
    });
    it('only supports a step of 1', () => {
        expect(resolveSlicing([slice(0, 4, 1)], shape).shape[0]).toBe(4);
        expect(() => resolveSlicing([slice(0, 4, 2)], shape)).toThrow(UnsupportedSliceError);
        expect(() => resolveSlicing([slice(null, null, -1)], shape)).toThrow(UnsupportedSliceError);
    });
    it('rejects indices outside of their axis', () => {
        expect(() => resolveSlicing([4], shape)).toThrow(BoundsError);
        expect(() => resolveSlicing([-5], shape)).toThrow(BoundsError);
        expect(resolveSlicing([-4], shape).offset[0]).toBe(0);
    });
    it('rejects fractional bounds', () => {
        expect(() => resolveSlicing([0.5], shape)).toThrow(UnsupportedSliceError);
        expect(() => resolveSlicing([slice(0, 2.5)], shape)).toThrow(UnsupportedSliceError);
    });
});
