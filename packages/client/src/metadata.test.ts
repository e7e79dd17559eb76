import { SchemaError } from '@cutout/core';
import { describe, expect, it } from 'vitest';
import {
    defaultMetadata,
    determineTypename,
    parseMetadata,
    serializeMetadata,
    VolumeMetadata,
    type VolumeMetadataDocument,
} from './metadata';

const doc: VolumeMetadataDocument = {
    Axes: [
        { Label: 'X', Resolution: 4, Units: 'nanometers', Size: 200 },
        { Label: 'Y', Resolution: 4, Units: 'nanometers', Size: 100 },
        { Label: 'Z', Resolution: 40, Units: 'nanometers', Size: 50 },
    ],
    Values: [
        { DataType: 'uint16', Label: 'red' },
        { DataType: 'uint16', Label: 'green' },
    ],
};

describe('parseMetadata', () => {
    it('reads the shape, channel first, from the axes and values', () => {
        const metadata = parseMetadata(doc);
        expect(metadata.shape).toEqual([2, 200, 100, 50]);
        expect(metadata.dtype).toBe('uint16');
        expect(metadata.axisLabels).toEqual(['c', 'x', 'y', 'z']);
        expect(metadata.resolution).toEqual([4, 4, 40]);
        expect(metadata.resolutionUnit).toBe('nanometers');
        expect(metadata.channelLabels).toEqual(['red', 'green']);
        expect(metadata.channelCount).toBe(2);
    });
    it('accepts JSON text and utf-8 bytes', () => {
        const fromText = parseMetadata(JSON.stringify(doc));
        const fromBytes = parseMetadata(new TextEncoder().encode(JSON.stringify(doc)));
        expect(fromText.equals(parseMetadata(doc))).toBe(true);
        expect(fromBytes.equals(parseMetadata(doc))).toBe(true);
    });
    it('rejects text that is not JSON', () => {
        expect(() => parseMetadata('{"Axes": [')).toThrow(SchemaError);
    });
    it('rejects documents with missing or mistyped fields', () => {
        expect(() => parseMetadata({ Axes: doc.Axes })).toThrow(SchemaError);
        expect(() => parseMetadata({ ...doc, Values: [{ DataType: 'complex64', Label: '' }] })).toThrow(SchemaError);
        expect(() =>
            parseMetadata({ ...doc, Axes: [{ Label: 'X', Resolution: '4', Units: 'nanometers', Size: 200 }] }),
        ).toThrow(SchemaError);
    });
    it('rejects unknown and repeated axis labels', () => {
        const axis = { Resolution: 1, Units: 'nanometers', Size: 10 };
        expect(() => parseMetadata({ ...doc, Axes: [{ ...axis, Label: 'Q' }] })).toThrow(SchemaError);
        expect(() =>
            parseMetadata({
                ...doc,
                Axes: [
                    { ...axis, Label: 'X' },
                    { ...axis, Label: 'x' },
                ],
            }),
        ).toThrow(SchemaError);
    });
    it('rejects channels of differing types', () => {
        expect(() =>
            parseMetadata({
                ...doc,
                Values: [
                    { DataType: 'uint16', Label: 'red' },
                    { DataType: 'uint8', Label: 'green' },
                ],
            }),
        ).toThrow(SchemaError);
    });
    it('rejects axes with differing units', () => {
        expect(() =>
            parseMetadata({
                ...doc,
                Axes: [
                    { Label: 'X', Resolution: 4, Units: 'nanometers', Size: 200 },
                    { Label: 'Y', Resolution: 4, Units: 'micrometers', Size: 100 },
                ],
            }),
        ).toThrow(SchemaError);
    });
});

describe('serializeMetadata', () => {
    it('writes upper case labels and one value per channel', () => {
        const metadata = defaultMetadata([3, 10, 20], 'float32', ['c', 'y', 'x'], 0.5, 'micrometers');
        expect(serializeMetadata(metadata)).toEqual({
            Axes: [
                { Label: 'Y', Resolution: 0.5, Units: 'micrometers', Size: 10 },
                { Label: 'X', Resolution: 0.5, Units: 'micrometers', Size: 20 },
            ],
            Values: [
                { DataType: 'float32', Label: '' },
                { DataType: 'float32', Label: '' },
                { DataType: 'float32', Label: '' },
            ],
        });
    });
    it('is undone by parseMetadata', () => {
        const cases = [
            parseMetadata(doc),
            defaultMetadata([1, 5], 'int64', ['c', 'x'], 1, 'pixels'),
            defaultMetadata([4, 7, 8, 9, 2], 'uint8', ['c', 'x', 'y', 'z', 't'], 2.5, 'microns'),
        ];
        for (const metadata of cases) {
            expect(parseMetadata(serializeMetadata(metadata)).equals(metadata)).toBe(true);
            expect(parseMetadata(JSON.stringify(serializeMetadata(metadata))).toJSON()).toEqual(metadata.toJSON());
        }
    });
});

describe('VolumeMetadata', () => {
    const base = defaultMetadata([1, 100, 100, 100], 'uint8', ['c', 'x', 'y', 'z'], 1, 'nanometers');

    it('checks that its fields agree', () => {
        expect(() => base.with({ shape: [1, 100, 100] })).toThrow(SchemaError);
        expect(() => base.with({ resolution: [1, 1] })).toThrow(SchemaError);
        expect(() => base.with({ axisLabels: ['x', 'c', 'y', 'z'] })).toThrow(SchemaError);
        expect(() => base.with({ axisLabels: ['c', 'x', 'x', 'z'] })).toThrow(SchemaError);
        expect(() => base.with({ shape: [1, 100, 0, 100] })).toThrow(SchemaError);
        expect(() => base.with({ channelLabels: ['a', 'b'] })).toThrow(SchemaError);
    });
    it('derives changed copies, leaving the original alone', () => {
        const wider = base.with({ dtype: 'uint16' });
        expect(wider.dtype).toBe('uint16');
        expect(base.dtype).toBe('uint8');
        expect(wider.equals(base)).toBe(false);
        expect(wider.with({ dtype: 'uint8' }).equals(base)).toBe(true);
    });
    it('names a single unlabelled channel per channel by default', () => {
        expect(new VolumeMetadata({ ...base.toJSON(), channelLabels: undefined }).channelLabels).toEqual(['']);
    });
});

describe('determineTypename', () => {
    const of = (channels: number, dtype: 'uint8' | 'uint32' | 'uint64' | 'float32') =>
        determineTypename(defaultMetadata([channels, 8, 8, 8], dtype, ['c', 'x', 'y', 'z'], 1, 'nm'));

    it('picks the specific names the server knows', () => {
        expect(of(1, 'uint8')).toBe('grayscale8');
        expect(of(1, 'uint32')).toBe('labels32');
        expect(of(1, 'uint64')).toBe('labels64');
        expect(of(4, 'uint8')).toBe('rgba8');
    });
    it('falls back to the generic name', () => {
        expect(of(2, 'uint8')).toBe('voxels');
        expect(of(1, 'float32')).toBe('voxels');
    });
});
