import { DtypeMismatchError, ShapeMismatchError } from '@cutout/core';

export const VOXEL_DTYPES = [
    'uint8',
    'int8',
    'uint16',
    'int16',
    'uint32',
    'int32',
    'uint64',
    'int64',
    'float32',
    'float64',
] as const;

export type VoxelDtype = (typeof VOXEL_DTYPES)[number];

export type VoxelTypedArray =
    | Uint8Array
    | Int8Array
    | Uint16Array
    | Int16Array
    | Uint32Array
    | Int32Array
    | BigUint64Array
    | BigInt64Array
    | Float32Array
    | Float64Array;

/**
 * a dense, row-major (last axis varies fastest) N-dimensional array
 */
export type NdArray = {
    readonly dtype: VoxelDtype;
    readonly shape: ReadonlyArray<number>;
    readonly data: VoxelTypedArray;
};

const ITEM_SIZES: Record<VoxelDtype, number> = {
    uint8: 1,
    int8: 1,
    uint16: 2,
    int16: 2,
    uint32: 4,
    int32: 4,
    uint64: 8,
    int64: 8,
    float32: 4,
    float64: 8,
};

export function isVoxelDtype(maybe: unknown): maybe is VoxelDtype {
    return VOXEL_DTYPES.some((d) => d === maybe);
}

export function itemSize(dtype: VoxelDtype): number {
    return ITEM_SIZES[dtype];
}

export function product(shape: ReadonlyArray<number>): number {
    return shape.reduce((p, n) => p * n, 1);
}

export function byteLength(shape: ReadonlyArray<number>, dtype: VoxelDtype): number {
    return product(shape) * itemSize(dtype);
}

/**
 * view (not copy) the given buffer as elements of the given type. The buffer must hold a whole number of elements.
 */
export function typedArrayFor(dtype: VoxelDtype, buffer: ArrayBuffer): VoxelTypedArray {
    switch (dtype) {
        case 'uint8':
            return new Uint8Array(buffer);
        case 'int8':
            return new Int8Array(buffer);
        case 'uint16':
            return new Uint16Array(buffer);
        case 'int16':
            return new Int16Array(buffer);
        case 'uint32':
            return new Uint32Array(buffer);
        case 'int32':
            return new Int32Array(buffer);
        case 'uint64':
            return new BigUint64Array(buffer);
        case 'int64':
            return new BigInt64Array(buffer);
        case 'float32':
            return new Float32Array(buffer);
        case 'float64':
            return new Float64Array(buffer);
    }
}

export function dtypeOf(data: VoxelTypedArray): VoxelDtype {
    if (data instanceof Uint8Array) return 'uint8';
    if (data instanceof Int8Array) return 'int8';
    if (data instanceof Uint16Array) return 'uint16';
    if (data instanceof Int16Array) return 'int16';
    if (data instanceof Uint32Array) return 'uint32';
    if (data instanceof Int32Array) return 'int32';
    if (data instanceof BigUint64Array) return 'uint64';
    if (data instanceof BigInt64Array) return 'int64';
    if (data instanceof Float32Array) return 'float32';
    return 'float64';
}

/**
 * @returns the raw bytes behind a typed array, without copying them
 */
export function bytesOf(data: ArrayBufferView): Uint8Array {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * copy raw bytes into a freshly allocated (and so correctly aligned) array of the given type
 */
export function fromBytes(dtype: VoxelDtype, bytes: Uint8Array): VoxelTypedArray {
    if (bytes.byteLength % itemSize(dtype) !== 0) {
        throw new ShapeMismatchError(`${bytes.byteLength} bytes is not a whole number of ${dtype} elements`);
    }
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    return typedArrayFor(dtype, buffer);
}

/**
 * allocate a zero-filled array
 */
export function zeros(dtype: VoxelDtype, shape: ReadonlyArray<number>): NdArray {
    return { dtype, shape: [...shape], data: typedArrayFor(dtype, new ArrayBuffer(byteLength(shape, dtype))) };
}

/**
 * wrap existing data as an NdArray, checking that its size fits the given shape
 */
export function ndarray(data: VoxelTypedArray, shape: ReadonlyArray<number>): NdArray {
    if (data.length !== product(shape)) {
        throw new ShapeMismatchError(`cannot view ${data.length} elements as shape [${shape.join(',')}]`);
    }
    return { dtype: dtypeOf(data), shape: [...shape], data };
}

/**
 * give the same data a new shape with the same number of elements (eg. to add or drop axes of length 1)
 */
export function reshape(array: NdArray, shape: ReadonlyArray<number>): NdArray {
    if (product(shape) !== product(array.shape)) {
        throw new ShapeMismatchError(`cannot reshape [${array.shape.join(',')}] into [${shape.join(',')}]`);
    }
    return { dtype: array.dtype, shape: [...shape], data: array.data };
}

export function assertDtype(array: NdArray, expected: VoxelDtype) {
    if (array.dtype !== expected || dtypeOf(array.data) !== expected) {
        throw new DtypeMismatchError(`expected ${expected} data, got ${dtypeOf(array.data)}`);
    }
}

/**
 * @returns a view of the leading-axis block [from, to) of a row-major array
 */
export function leadingAxisBlock(array: NdArray, from: number, to: number): NdArray {
    const inner = product(array.shape.slice(1));
    return {
        dtype: array.dtype,
        shape: [to - from, ...array.shape.slice(1)],
        data: array.data.subarray(from * inner, to * inner),
    };
}
