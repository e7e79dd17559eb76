import { BoundsError, ShapeMismatchError, UnsupportedSliceError } from '@cutout/core';
import { BoxND } from '@cutout/geometry';
import { isEqual } from 'lodash';
import type { VolumeId } from './codec';
import type { AxisLabel, VolumeMetadata } from './metadata';
import { leadingAxisBlock, type NdArray, reshape, type VoxelDtype, zeros } from './ndarray';
import type { CutoutSession } from './session';
import { resolveSlicing, resultShape, type Slicing } from './slicing';
import { getMetadata, readCutout, writeCutout } from './voxels';

/**
 * Read and write regions of one remote volume. Offsets, shapes and arrays are always in canonical
 * (channel-first) order, whatever order the server stores the voxels in.
 */
export class VolumeAccessor {
    readonly session: CutoutSession;
    readonly volume: VolumeId;
    #metadata: VolumeMetadata;

    constructor(session: CutoutSession, volume: VolumeId, metadata: VolumeMetadata) {
        this.session = session;
        this.volume = { ...volume };
        this.#metadata = metadata;
    }

    /**
     * fetch the metadata of a volume and return an accessor for it
     */
    static async open(session: CutoutSession, uuid: string, name: string): Promise<VolumeAccessor> {
        const volume = { uuid, name };
        return new VolumeAccessor(session, volume, await getMetadata(session, volume));
    }

    get metadata(): VolumeMetadata {
        return this.#metadata;
    }

    get shape(): ReadonlyArray<number> {
        return this.#metadata.shape;
    }

    get dtype(): VoxelDtype {
        return this.#metadata.dtype;
    }

    get axisLabels(): ReadonlyArray<AxisLabel> {
        return this.#metadata.axisLabels;
    }

    #checkBounds(offset: ReadonlyArray<number>, shape: ReadonlyArray<number>) {
        const volumeShape = this.shape;
        if (offset.length !== volumeShape.length || shape.length !== volumeShape.length) {
            throw new BoundsError(
                `expected ${volumeShape.length} axes, got an offset of ${offset.length} and a shape of ${shape.length}`,
            );
        }
        const box = BoxND.fromOffsetShape(offset, shape);
        if (!BoxND.isWithin(box, volumeShape)) {
            throw new BoundsError(
                `region at [${offset.join(',')}] of shape [${shape.join(',')}] is not inside volume [${volumeShape.join(',')}]`,
            );
        }
    }

    /**
     * read the region [offset, offset + shape)
     * @returns an array of exactly the given shape
     * @throws BoundsError if the region has the wrong number of axes, or reaches outside the volume
     */
    async getSubvolume(offset: ReadonlyArray<number>, shape: ReadonlyArray<number>): Promise<NdArray> {
        this.#checkBounds(offset, shape);
        if (shape.some((n) => n === 0)) {
            return zeros(this.dtype, shape);
        }
        // the server always sends every channel
        const channels = this.#metadata.channelCount;
        const box = BoxND.fromOffsetShape([0, ...offset.slice(1)], [channels, ...shape.slice(1)]);
        const all = await readCutout(this.session, this.volume, this.#metadata, box);
        return shape[0] === channels ? all : leadingAxisBlock(all, offset[0], offset[0] + shape[0]);
    }

    /**
     * overwrite the region [offset, offset + shape) with the given data, which must include every channel
     * @returns data, unchanged
     * @throws BoundsError if the region does not fit the volume, or leaves out some channels
     * @throws ShapeMismatchError if the data does not have the given shape
     * @throws DtypeMismatchError if the data is not of the volume's element type
     */
    async postSubvolume(offset: ReadonlyArray<number>, shape: ReadonlyArray<number>, data: NdArray): Promise<NdArray> {
        this.#checkBounds(offset, shape);
        if (!isEqual(data.shape, [...shape])) {
            throw new ShapeMismatchError(`data has shape [${data.shape.join(',')}], expected [${shape.join(',')}]`);
        }
        await writeCutout(this.session, this.volume, this.#metadata, BoxND.fromOffsetShape(offset, shape), data);
        return data;
    }

    /**
     * read the region a slicing selects. Axes selected by a single index are dropped from the result.
     * @example accessor.read([ELLIPSIS, slice(0, 10)])
     * @example accessor.read([0, slice(10, 110), slice(20, 120), 64]) // one channel, one z-plane: a 2D result
     */
    async read(slicing: Slicing): Promise<NdArray> {
        const resolved = resolveSlicing(slicing, this.shape);
        const region = await this.getSubvolume(resolved.offset, resolved.shape);
        return reshape(region, resultShape(resolved));
    }

    /**
     * write data into the region a slicing selects. The data may leave out axes selected by a single
     * index, or keep them with a length of 1. The channel axis must be selected by a range.
     * @returns data, unchanged
     */
    async write(slicing: Slicing, data: NdArray): Promise<NdArray> {
        const resolved = resolveSlicing(slicing, this.shape);
        if (resolved.reduced[0]) {
            throw new UnsupportedSliceError('the channel axis must be sliced with a range when writing');
        }
        if (!isEqual(data.shape, resultShape(resolved)) && !isEqual(data.shape, resolved.shape)) {
            throw new ShapeMismatchError(
                `data of shape [${data.shape.join(',')}] does not fit the selected region [${resolved.shape.join(',')}]`,
            );
        }
        await this.postSubvolume(resolved.offset, resolved.shape, reshape(data, resolved.shape));
        return data;
    }
}
