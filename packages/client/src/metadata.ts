import { logger, SchemaError } from '@cutout/core';
import { isEqual } from 'lodash';
import { z, ZodError } from 'zod';
import { VOXEL_DTYPES, type VoxelDtype } from './ndarray';

export const CHANNEL_LABEL = 'c';
export const SPATIAL_LABELS = ['x', 'y', 'z', 't'] as const;

export type SpatialLabel = (typeof SPATIAL_LABELS)[number];
export type AxisLabel = typeof CHANNEL_LABEL | SpatialLabel;

// The metadata document, as it travels over the wire. Channels are implicit: one entry in "Values" per channel.
// Axis labels are upper case on the wire, and lower case in memory.

const WireAxisLabelSchema = z
    .string()
    .transform((label) => label.toLowerCase())
    .pipe(z.enum(SPATIAL_LABELS));

export const MetadataAxisSchema = z.object({
    Label: WireAxisLabelSchema,
    Resolution: z.number().positive(),
    Units: z.string(),
    Size: z.number().int().positive(),
});

export const MetadataValueSchema = z.object({
    DataType: z.enum(VOXEL_DTYPES),
    Label: z.string(),
});

export const VolumeMetadataDocumentSchema = z.object({
    Axes: MetadataAxisSchema.array().nonempty(),
    Values: MetadataValueSchema.array().nonempty(),
});

export type VolumeMetadataDocument = z.input<typeof VolumeMetadataDocumentSchema>;

export type VolumeMetadataFields = {
    shape: ReadonlyArray<number>;
    dtype: VoxelDtype;
    axisLabels: ReadonlyArray<AxisLabel>;
    resolution: ReadonlyArray<number>;
    resolutionUnit: string;
    channelLabels?: ReadonlyArray<string> | undefined;
};

function problemsWith(fields: VolumeMetadataFields): string[] {
    const { shape, axisLabels, resolution, channelLabels } = fields;
    const problems: string[] = [];
    if (shape.length !== axisLabels.length) {
        problems.push(`shape [${shape.join(',')}] does not match axis labels "${axisLabels.join('')}"`);
    }
    if (shape.some((n) => !Number.isSafeInteger(n) || n <= 0)) {
        problems.push(`shape must be positive integers, got [${shape.join(',')}]`);
    }
    if (axisLabels[0] !== CHANNEL_LABEL) {
        problems.push(`the channel axis must come first, got "${axisLabels.join('')}"`);
    }
    if (axisLabels.length < 2) {
        problems.push('at least one non-channel axis is required');
    }
    if (new Set(axisLabels).size !== axisLabels.length) {
        problems.push(`axis labels must be unique, got "${axisLabels.join('')}"`);
    }
    if (axisLabels.slice(1).some((label) => label === CHANNEL_LABEL)) {
        problems.push('only the first axis may be the channel axis');
    }
    if (resolution.length !== axisLabels.length - 1) {
        problems.push(`expected ${axisLabels.length - 1} resolution values, got ${resolution.length}`);
    }
    if (resolution.some((r) => !Number.isFinite(r) || r <= 0)) {
        problems.push('resolution values must be positive');
    }
    if (channelLabels !== undefined && channelLabels.length !== shape[0]) {
        problems.push(`expected ${shape[0]} channel labels, got ${channelLabels.length}`);
    }
    return problems;
}

/**
 * An immutable description of a volume: its shape (channel axis first), element type, axis labels and resolution.
 * Use `with` to derive a changed copy.
 */
export class VolumeMetadata {
    #shape: ReadonlyArray<number>;
    #dtype: VoxelDtype;
    #axisLabels: ReadonlyArray<AxisLabel>;
    #resolution: ReadonlyArray<number>;
    #resolutionUnit: string;
    #channelLabels: ReadonlyArray<string>;

    /**
     * @throws SchemaError if the fields are inconsistent with one another
     */
    constructor(fields: VolumeMetadataFields) {
        const problems = problemsWith(fields);
        if (problems.length > 0) {
            throw new SchemaError(`invalid volume metadata: ${problems.join('; ')}`);
        }
        this.#shape = Object.freeze([...fields.shape]);
        this.#dtype = fields.dtype;
        this.#axisLabels = Object.freeze([...fields.axisLabels]);
        this.#resolution = Object.freeze([...fields.resolution]);
        this.#resolutionUnit = fields.resolutionUnit;
        this.#channelLabels = Object.freeze([...(fields.channelLabels ?? Array.from({ length: fields.shape[0] }, () => ''))]);
    }

    get shape(): ReadonlyArray<number> {
        return this.#shape;
    }

    get dtype(): VoxelDtype {
        return this.#dtype;
    }

    get axisLabels(): ReadonlyArray<AxisLabel> {
        return this.#axisLabels;
    }

    get resolution(): ReadonlyArray<number> {
        return this.#resolution;
    }

    get resolutionUnit(): string {
        return this.#resolutionUnit;
    }

    get channelLabels(): ReadonlyArray<string> {
        return this.#channelLabels;
    }

    get channelCount(): number {
        return this.#shape[0];
    }

    with(changes: Partial<VolumeMetadataFields>): VolumeMetadata {
        return new VolumeMetadata({ ...this.toJSON(), ...changes });
    }

    equals(other: VolumeMetadata): boolean {
        return isEqual(this.toJSON(), other.toJSON());
    }

    toJSON(): Required<VolumeMetadataFields> {
        return {
            shape: this.shape,
            dtype: this.dtype,
            axisLabels: this.axisLabels,
            resolution: this.resolution,
            resolutionUnit: this.resolutionUnit,
            channelLabels: this.channelLabels,
        };
    }
}

function decodeInput(input: unknown): unknown {
    const text = input instanceof Uint8Array ? new TextDecoder().decode(input) : input;
    if (typeof text !== 'string') {
        return text;
    }
    try {
        return JSON.parse(text);
    } catch (e) {
        throw new SchemaError('could not parse volume metadata: not valid JSON', { cause: e });
    }
}

/**
 * parse a metadata document, as served by (or sent to) the cutout REST api
 * @param input the document as JSON text, utf-8 bytes, or an already-parsed object
 * @throws SchemaError if required fields are missing, of the wrong type, or inconsistent
 */
export function parseMetadata(input: unknown): VolumeMetadata {
    let doc: z.output<typeof VolumeMetadataDocumentSchema>;
    try {
        doc = VolumeMetadataDocumentSchema.parse(decodeInput(input));
    } catch (e) {
        if (e instanceof ZodError) {
            logger.error('could not load volume metadata: parsing failed');
            const problems = e.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
            throw new SchemaError(`invalid volume metadata: ${problems.join('; ')}`, { cause: e });
        }
        throw e;
    }
    const dtypes = new Set(doc.Values.map((v) => v.DataType));
    if (dtypes.size !== 1) {
        throw new SchemaError(`heterogeneous channel types are not supported: ${[...dtypes].join(', ')}`);
    }
    const units = new Set(doc.Axes.map((a) => a.Units));
    if (units.size !== 1) {
        throw new SchemaError(`every axis must share one resolution unit, got: ${[...units].join(', ')}`);
    }
    return new VolumeMetadata({
        shape: [doc.Values.length, ...doc.Axes.map((a) => a.Size)],
        dtype: doc.Values[0].DataType,
        axisLabels: [CHANNEL_LABEL, ...doc.Axes.map((a) => a.Label)],
        resolution: doc.Axes.map((a) => a.Resolution),
        resolutionUnit: doc.Axes[0].Units,
        channelLabels: doc.Values.map((v) => v.Label),
    });
}

/**
 * the inverse of parseMetadata
 */
export function serializeMetadata(metadata: VolumeMetadata): VolumeMetadataDocument {
    const [first, ...rest] = metadata.axisLabels.slice(1).map((label, i) => ({
        Label: label.toUpperCase(),
        Resolution: metadata.resolution[i],
        Units: metadata.resolutionUnit,
        Size: metadata.shape[i + 1],
    }));
    const [firstValue, ...otherValues] = metadata.channelLabels.map((Label) => ({ DataType: metadata.dtype, Label }));
    return { Axes: [first, ...rest], Values: [firstValue, ...otherValues] };
}

/**
 * build metadata with the same resolution on every non-channel axis, and unnamed channels
 * @example defaultMetadata([3, 100, 200, 300], 'uint8', ['c', 'x', 'y', 'z'], 1.5, 'micrometers')
 */
export function defaultMetadata(
    shape: ReadonlyArray<number>,
    dtype: VoxelDtype,
    axisLabels: ReadonlyArray<AxisLabel>,
    resolutionScale: number,
    unit: string,
): VolumeMetadata {
    return new VolumeMetadata({
        shape,
        dtype,
        axisLabels,
        resolution: axisLabels.slice(1).map(() => resolutionScale),
        resolutionUnit: unit,
    });
}

const TYPENAMES: ReadonlyArray<{ dtype: VoxelDtype; channels: number; typename: string }> = [
    { dtype: 'uint8', channels: 1, typename: 'grayscale8' },
    { dtype: 'uint32', channels: 1, typename: 'labels32' },
    { dtype: 'uint64', channels: 1, typename: 'labels64' },
    { dtype: 'uint8', channels: 4, typename: 'rgba8' },
];

export const GENERIC_TYPENAME = 'voxels';

/**
 * @returns the data type name the server expects in the volume creation path for a volume with this metadata
 */
export function determineTypename(metadata: VolumeMetadata): string {
    const known = TYPENAMES.find((t) => t.dtype === metadata.dtype && t.channels === metadata.channelCount);
    return known?.typename ?? GENERIC_TYPENAME;
}

export function isAxisLabel(maybe: unknown): maybe is AxisLabel {
    return maybe === CHANNEL_LABEL || SPATIAL_LABELS.some((label) => label === maybe);
}
