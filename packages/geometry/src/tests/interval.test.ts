import { contains, type Interval, isIntegerInterval, limit, size, within } from '../interval';
import { describe, expect, it } from 'vitest';
function I(a: number, b: number): Interval {
    return { min: a, max: b };
}
describe('integer intervals', () => {
    describe('size', () => {
        it('size is the signed distance between min and max', () => {
            expect(size(I(1, 3))).toBe(2);
            expect(size(I(11, -3))).toBe(-14);
            expect(size(I(1, 1))).toBe(0);
        });
    });
    describe('within', () => {
        it('within is inclusive of min and exclusive of max', () => {
            expect(within(I(10, 30), 10)).toBe(true);
            expect(within(I(10, 30), 29)).toBe(true);
            expect(within(I(10, 30), 30)).toBe(false);
            expect(within(I(10, 30), 9)).toBe(false);
        });
    });
    describe('contains', () => {
        it('an interval contains those that fit inside it', () => {
            expect(contains(I(0, 100), I(50, 100))).toBe(true);
            expect(contains(I(0, 100), I(50, 110))).toBe(false);
            expect(contains(I(0, 100), I(-1, 10))).toBe(false);
            expect(contains(I(0, 100), I(100, 100))).toBe(true);
            // inverted intervals fit nowhere
            expect(contains(I(0, 100), I(20, 10))).toBe(false);
        });
    });
    describe('isIntegerInterval', () => {
        it('rejects fractions and non-finite values', () => {
            expect(isIntegerInterval(I(0, 3))).toBe(true);
            expect(isIntegerInterval(I(0.5, 3))).toBe(false);
            expect(isIntegerInterval(I(0, Number.POSITIVE_INFINITY))).toBe(false);
        });
    });
    describe('limit', () => {
        it('clamps a value into [min, max]', () => {
            expect(limit(I(1, 4), 0)).toEqual(1);
            expect(limit(I(1, 4), 50)).toEqual(4);
            expect(limit(I(1, 4), 2)).toEqual(2);
        });
    });
});
