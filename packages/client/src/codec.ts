import {
    AxisMismatchError,
    BoundsError,
    DEFAULT_CHUNK_SIZE,
    logger as defaultLogger,
    type Logger,
    OversizedPayloadError,
    ShapeMismatchError,
    TruncatedPayloadError,
} from '@cutout/core';
import { BoxND, type boxND } from '@cutout/geometry';
import { range } from 'lodash';
import { type AxisOrderMapping, computeStrides, isIdentityMapping, permuteToCanonical, toCanonicalOrder } from './axes';
import { CHANNEL_LABEL } from './metadata';
import { byteLength, bytesOf, itemSize, type NdArray, product, typedArrayFor, type VoxelDtype } from './ndarray';

export const VOLUME_MIMETYPE = 'application/octet-stream';

export type VolumeId = {
    uuid: string;
    name: string;
};

export type CutoutMethod = 'GET' | 'POST';

export type CutoutRequest = {
    method: CutoutMethod;
    path: string;
    headers: Record<string, string>;
    // shape of the payload, in wire order, channel axis included
    wireShape: number[];
    byteLength: number;
};

export type ByteSource = ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>;

export type StreamOptions = {
    chunkSize?: number | undefined;
    // when given, the decoded array is in canonical order (and the encoded array is read from canonical order)
    mapping?: AxisOrderMapping | undefined;
    logger?: Logger | undefined;
};

/**
 * @returns the media type of a cutout payload of the given element type, eg. "application/octet-stream; dtype=uint16"
 */
export function volumeContentType(dtype: VoxelDtype) {
    return `${VOLUME_MIMETYPE}; dtype=${dtype}`;
}

export function volumePath(volume: VolumeId) {
    return `/api/node/${encodeURIComponent(volume.uuid)}/${encodeURIComponent(volume.name)}`;
}

/**
 * describe the HTTP request that reads (GET) or writes (POST) the given region of a volume.
 * The path carries the non-channel axes only, in canonical order: `.../raw/0_1_2/<size>/<offset>`.
 * Every request covers all channels, so the channel range of the box must start at zero.
 * @param wireBox the region, in wire order, channel axis included
 */
export function buildRequest(
    volume: VolumeId,
    wireBox: boxND,
    mapping: AxisOrderMapping,
    method: CutoutMethod,
    dtype: VoxelDtype,
): CutoutRequest {
    const canonical = toCanonicalOrder(wireBox, mapping);
    const channelAxis = mapping.canonical.indexOf(CHANNEL_LABEL);
    if (channelAxis < 0) {
        throw new AxisMismatchError(`axes "${mapping.canonical.join('')}" have no channel axis`);
    }
    if (!BoxND.isValid(canonical) || canonical.start.some((s) => s < 0)) {
        throw new BoundsError(`invalid region: [${canonical.start.join(',')}] to [${canonical.stop.join(',')}]`);
    }
    if (canonical.start[channelAxis] !== 0) {
        throw new BoundsError('cutout requests always include every channel, starting from channel 0');
    }
    const spatial = (values: ReadonlyArray<number>) => values.filter((_, i) => i !== channelAxis);
    const offset = spatial(canonical.start);
    const size = spatial(BoxND.shape(canonical));
    const dims = range(offset.length).join('_');
    const path = `${volumePath(volume)}/raw/${dims}/${size.join('_')}/${offset.join('_')}`;
    const wireShape = BoxND.shape(wireBox);
    const length = byteLength(wireShape, dtype);
    const headers: Record<string, string> =
        method === 'POST' ? { 'Content-Type': volumeContentType(dtype), 'Content-Length': `${length}` } : {};
    return { method, path, headers, wireShape, byteLength: length };
}

/**
 * Walks the elements of a row-major array one at a time, tracking the byte offset each element has
 * in a second layout of the same elements (given by per-axis byte strides).
 */
class ElementCursor {
    private readonly index: number[];
    private readonly shape: ReadonlyArray<number>;
    private readonly strides: ReadonlyArray<number>;
    offset = 0;

    constructor(shape: ReadonlyArray<number>, strides: ReadonlyArray<number>) {
        this.shape = shape;
        this.strides = strides;
        this.index = shape.map(() => 0);
    }

    advance() {
        for (let axis = this.shape.length - 1; axis >= 0; axis -= 1) {
            this.index[axis] += 1;
            this.offset += this.strides[axis];
            if (this.index[axis] < this.shape[axis]) {
                return;
            }
            this.offset -= this.strides[axis] * this.shape[axis];
            this.index[axis] = 0;
        }
    }
}

/**
 * strides, in bytes, of the canonical layout, listed in wire axis order
 */
function canonicalStridesByWireAxis(wireShape: ReadonlyArray<number>, mapping: AxisOrderMapping, size: number) {
    const canonicalStrides = computeStrides(permuteToCanonical(wireShape, mapping), size);
    return mapping.wireFromCanonical.map((from) => canonicalStrides[from]);
}

/**
 * copies a stream of wire-ordered bytes into a destination buffer; elements may be split across pieces
 */
class PayloadWriter {
    private readonly out: Uint8Array;
    private readonly size: number;
    private readonly cursor: ElementCursor | undefined;
    // bytes of the current element written so far
    private partial = 0;
    written = 0;

    constructor(out: Uint8Array, size: number, cursor: ElementCursor | undefined) {
        this.out = out;
        this.size = size;
        this.cursor = cursor;
    }

    write(piece: Uint8Array) {
        const { cursor, out, size } = this;
        if (!cursor) {
            out.set(piece, this.written);
            this.written += piece.byteLength;
            return;
        }
        for (let i = 0; i < piece.byteLength; i += 1) {
            out[cursor.offset + this.partial] = piece[i];
            this.partial += 1;
            if (this.partial === size) {
                this.partial = 0;
                cursor.advance();
            }
        }
        this.written += piece.byteLength;
    }
}

async function* piecesOf(source: ByteSource, chunkSize: number): AsyncGenerator<Uint8Array> {
    const split = function* (chunk: Uint8Array) {
        for (let start = 0; start < chunk.byteLength; start += chunkSize) {
            yield chunk.subarray(start, Math.min(start + chunkSize, chunk.byteLength));
        }
    };
    if ('getReader' in source) {
        const reader = source.getReader();
        let finished = false;
        try {
            while (!finished) {
                const { done, value } = await reader.read();
                finished = done;
                if (value) {
                    yield* split(value);
                }
            }
        } finally {
            if (!finished) {
                await reader.cancel();
            }
            reader.releaseLock();
        }
        return;
    }
    for await (const chunk of source) {
        yield* split(chunk);
    }
}

/**
 * Decode a payload stream into a new array, reading at most chunkSize bytes at a time into a buffer
 * sized exactly for the given shape. When a mapping is given, each element is placed at its canonical
 * position as it arrives, and the result has the canonical shape.
 * @param wireShape the shape of the payload, in wire order
 * @throws TruncatedPayloadError if the stream ends early
 * @throws OversizedPayloadError if the stream has more bytes than the shape calls for
 */
export async function decodeStream(
    source: ByteSource,
    wireShape: ReadonlyArray<number>,
    dtype: VoxelDtype,
    options: StreamOptions = {},
): Promise<NdArray> {
    const { chunkSize = DEFAULT_CHUNK_SIZE, mapping, logger = defaultLogger } = options;
    const expected = byteLength(wireShape, dtype);
    const buffer = new ArrayBuffer(expected);
    const reorder = mapping !== undefined && !isIdentityMapping(mapping);
    const cursor = reorder
        ? new ElementCursor(wireShape, canonicalStridesByWireAxis(wireShape, mapping, itemSize(dtype)))
        : undefined;
    const writer = new PayloadWriter(new Uint8Array(buffer), itemSize(dtype), cursor);

    for await (const piece of piecesOf(source, chunkSize)) {
        if (writer.written + piece.byteLength > expected) {
            const message = `payload is larger than the expected ${expected} bytes`;
            logger.error(message);
            throw new OversizedPayloadError(message);
        }
        writer.write(piece);
    }
    if (writer.written < expected) {
        const message = `payload ended after ${writer.written} of ${expected} bytes`;
        logger.error(message);
        throw new TruncatedPayloadError(message);
    }
    logger.debug(`decoded ${expected} bytes of ${dtype} [${wireShape.join(',')}]`);
    const shape = mapping ? permuteToCanonical(wireShape, mapping) : [...wireShape];
    return { dtype, shape, data: typedArrayFor(dtype, buffer) };
}

/**
 * The inverse of decodeStream: produce the payload for an array, in pieces of at most chunkSize bytes.
 * When a mapping is given, the array is taken to be in canonical order and each piece is gathered
 * in wire order as it is requested; the whole wire-ordered payload never exists at once.
 */
export function* encodeStream(array: NdArray, options: StreamOptions = {}): Generator<Uint8Array> {
    const { chunkSize = DEFAULT_CHUNK_SIZE, mapping } = options;
    if (array.data.length !== product(array.shape)) {
        throw new ShapeMismatchError(
            `array data holds ${array.data.length} elements, but its shape [${array.shape.join(',')}] calls for ${product(array.shape)}`,
        );
    }
    const source = bytesOf(array.data);
    const total = source.byteLength;
    if (mapping === undefined || isIdentityMapping(mapping)) {
        for (let start = 0; start < total; start += chunkSize) {
            yield source.subarray(start, Math.min(start + chunkSize, total));
        }
        return;
    }
    const size = itemSize(array.dtype);
    const wireShape = mapping.wireFromCanonical.map((from) => array.shape[from]);
    const cursor = new ElementCursor(wireShape, canonicalStridesByWireAxis(wireShape, mapping, size));
    let partial = 0;
    for (let start = 0; start < total; start += chunkSize) {
        const piece = new Uint8Array(Math.min(chunkSize, total - start));
        for (let i = 0; i < piece.byteLength; i += 1) {
            piece[i] = source[cursor.offset + partial];
            partial += 1;
            if (partial === size) {
                partial = 0;
                cursor.advance();
            }
        }
        yield piece;
    }
}

/**
 * expose a lazily produced sequence of byte chunks as a web stream, eg. for use as a request body
 */
export function toReadableStream(chunks: Iterable<Uint8Array>): ReadableStream<Uint8Array> {
    const iterator = chunks[Symbol.iterator]();
    return new ReadableStream<Uint8Array>({
        pull(controller) {
            try {
                const next = iterator.next();
                if (next.done) {
                    controller.close();
                } else {
                    controller.enqueue(next.value);
                }
            } catch (e) {
                controller.error(e);
            }
        },
        cancel() {
            iterator.return?.();
        },
    });
}
