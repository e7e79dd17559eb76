import { AxisMismatchError } from '@cutout/core';
import { BoxND } from '@cutout/geometry';
import { describe, expect, it } from 'vitest';
import {
    computeStrides,
    createAxisMapping,
    isIdentityMapping,
    permuteToCanonical,
    permuteToWire,
    toCanonicalOrder,
    toWireOrder,
} from './axes';

describe('createAxisMapping', () => {
    it('reverses the canonical order on the wire by default', () => {
        const mapping = createAxisMapping(['c', 'x', 'y', 'z']);
        expect(mapping.wire).toEqual(['z', 'y', 'x', 'c']);
        expect(mapping.wireFromCanonical).toEqual([3, 2, 1, 0]);
        expect(mapping.canonicalFromWire).toEqual([3, 2, 1, 0]);
        expect(isIdentityMapping(mapping)).toBe(false);
    });
    it('accepts any reordering of the same labels', () => {
        const mapping = createAxisMapping(['c', 'x', 'y', 'z'], ['z', 'c', 'y', 'x']);
        expect(mapping.wireFromCanonical).toEqual([3, 0, 2, 1]);
        expect(mapping.canonicalFromWire).toEqual([1, 3, 2, 0]);
        expect(isIdentityMapping(createAxisMapping(['c', 'x'], ['c', 'x']))).toBe(true);
    });
    it('rejects label sets that differ', () => {
        expect(() => createAxisMapping(['c', 'x', 'y'], ['c', 'x', 'z'])).toThrow(AxisMismatchError);
        expect(() => createAxisMapping(['c', 'x', 'y'], ['c', 'x'])).toThrow(AxisMismatchError);
        expect(() => createAxisMapping(['c', 'x', 'x'])).toThrow(AxisMismatchError);
        expect(() => createAxisMapping(['c', 'x', 'y'], ['c', 'x', 'x'])).toThrow(AxisMismatchError);
    });
});

describe('axis permutation', () => {
    const mapping = createAxisMapping(['c', 'x', 'y', 'z'], ['z', 'c', 'y', 'x']);

    it('moves per-axis values between orders', () => {
        expect(permuteToWire(['c', 'x', 'y', 'z'], mapping)).toEqual(['z', 'c', 'y', 'x']);
        expect(permuteToCanonical(['z', 'c', 'y', 'x'], mapping)).toEqual(['c', 'x', 'y', 'z']);
    });
    it('moves boxes to wire order and back', () => {
        const box = BoxND.create([0, 10, 20, 30], [4, 110, 120, 130]);
        const wire = toWireOrder(box, mapping);
        expect(wire).toEqual({ start: [30, 0, 20, 10], stop: [130, 4, 120, 110] });
        expect(toCanonicalOrder(wire, mapping)).toEqual(box);
    });
    it('round trips under every mapping of four axes', () => {
        const box = BoxND.create([0, 1, 2, 3], [5, 6, 7, 8]);
        const labels = ['c', 'x', 'y', 'z'] as const;
        const orders: (typeof labels)[number][][] = [[]];
        for (let n = 0; n < labels.length; n += 1) {
            const next: (typeof labels)[number][][] = [];
            for (const order of orders) {
                for (const label of labels.filter((l) => !order.includes(l))) {
                    next.push([...order, label]);
                }
            }
            orders.splice(0, orders.length, ...next);
        }
        expect(orders).toHaveLength(24);
        for (const wire of orders) {
            const m = createAxisMapping(labels, wire);
            expect(toCanonicalOrder(toWireOrder(box, m), m)).toEqual(box);
        }
    });
    it('rejects boxes of the wrong rank', () => {
        expect(() => toWireOrder(BoxND.create([0, 0], [1, 1]), mapping)).toThrow(AxisMismatchError);
        expect(() => permuteToCanonical([1, 2, 3], mapping)).toThrow(AxisMismatchError);
    });
});

describe('computeStrides', () => {
    it('gives row-major byte strides', () => {
        expect(computeStrides([4, 3, 2], 2)).toEqual([12, 4, 2]);
        expect(computeStrides([100, 100, 100, 4], 1)).toEqual([40000, 400, 4, 1]);
        expect(computeStrides([7], 8)).toEqual([8]);
    });
});
