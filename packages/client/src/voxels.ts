import {
    BoundsError,
    OversizedPayloadError,
    ShapeMismatchError,
    TruncatedPayloadError,
    UnexpectedResponseError,
} from '@cutout/core';
import { BoxND, type boxND } from '@cutout/geometry';
import { isEqual } from 'lodash';
import { axisMappingFor, toWireOrder } from './axes';
import { buildRequest, decodeStream, encodeStream, toReadableStream, volumePath, type VolumeId } from './codec';
import {
    determineTypename,
    parseMetadata,
    serializeMetadata,
    type VolumeMetadata,
    VolumeMetadataDocumentSchema,
} from './metadata';
import { assertDtype, type NdArray, zeros } from './ndarray';
import type { CutoutSession } from './session';

/**
 * fetch the metadata of a remote volume
 */
export async function getMetadata(session: CutoutSession, volume: VolumeId): Promise<VolumeMetadata> {
    const doc = await session.getJson('volume metadata', `${volumePath(volume)}/metadata`, VolumeMetadataDocumentSchema);
    return parseMetadata(doc);
}

/**
 * create a new, zero-filled volume under the given node
 * @throws CutoutHttpError 409 if the node already has a volume of that name
 */
export async function createVolume(session: CutoutSession, volume: VolumeId, metadata: VolumeMetadata): Promise<void> {
    const typename = determineTypename(metadata);
    const path = `/api/dataset/${encodeURIComponent(volume.uuid)}/new/${typename}/${encodeURIComponent(volume.name)}`;
    const response = await session.send('create volume', path, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(serializeMetadata(metadata)),
    });
    const text = await response.text();
    if (text.length > 0) {
        throw new UnexpectedResponseError(`expected an empty response to volume creation, got: ${text}`);
    }
    session.logger.info(`created volume ${volume.uuid}/${volume.name}`);
}

function checkDeclaredLength(response: Response, expected: number) {
    const declared = response.headers.get('Content-Length');
    if (declared === null) {
        return;
    }
    const length = Number(declared);
    if (declared.trim() === '' || !Number.isSafeInteger(length) || length < 0) {
        throw new UnexpectedResponseError(`server declared an invalid Content-Length "${declared}"`);
    }
    if (length < expected) {
        throw new TruncatedPayloadError(`server declared ${length} bytes, but the cutout needs ${expected}`);
    }
    if (length > expected) {
        throw new OversizedPayloadError(`server declared ${length} bytes, but the cutout needs only ${expected}`);
    }
}

function checkFullChannels(box: boxND, metadata: VolumeMetadata) {
    if (!BoxND.isWithin(box, metadata.shape)) {
        throw new BoundsError(
            `region [${box.start.join(',')}] to [${box.stop.join(',')}] is not inside volume [${metadata.shape.join(',')}]`,
        );
    }
    if (box.start[0] !== 0 || box.stop[0] !== metadata.channelCount) {
        throw new BoundsError(`cutout requests must include all ${metadata.channelCount} channels`);
    }
}

/**
 * read a region of a remote volume. The region must include every channel.
 * @param box the region, in canonical (channel-first) order
 * @returns the region's voxels, in canonical order
 */
export async function readCutout(
    session: CutoutSession,
    volume: VolumeId,
    metadata: VolumeMetadata,
    box: boxND,
): Promise<NdArray> {
    checkFullChannels(box, metadata);
    if (BoxND.isEmpty(box)) {
        return zeros(metadata.dtype, BoxND.shape(box));
    }
    const mapping = axisMappingFor(metadata);
    const request = buildRequest(volume, toWireOrder(box, mapping), mapping, 'GET', metadata.dtype);
    const response = await session.send('cutout read', request.path, { method: request.method });
    const body = response.body;
    if (body === null) {
        throw new TruncatedPayloadError(`the response to ${request.path} has no body`);
    }
    try {
        checkDeclaredLength(response, request.byteLength);
    } catch (e) {
        await body.cancel();
        throw e;
    }
    return decodeStream(body, request.wireShape, metadata.dtype, {
        chunkSize: session.chunkSize,
        mapping,
        logger: session.logger,
    });
}

/**
 * overwrite a region of a remote volume. The region must include every channel, and data must
 * be in canonical order with exactly the region's shape.
 */
export async function writeCutout(
    session: CutoutSession,
    volume: VolumeId,
    metadata: VolumeMetadata,
    box: boxND,
    data: NdArray,
): Promise<void> {
    checkFullChannels(box, metadata);
    if (!isEqual(data.shape, BoxND.shape(box))) {
        throw new ShapeMismatchError(
            `data of shape [${data.shape.join(',')}] cannot fill a region of shape [${BoxND.shape(box).join(',')}]`,
        );
    }
    assertDtype(data, metadata.dtype);
    if (BoxND.isEmpty(box)) {
        return;
    }
    const mapping = axisMappingFor(metadata);
    const request = buildRequest(volume, toWireOrder(box, mapping), mapping, 'POST', metadata.dtype);
    const body = toReadableStream(encodeStream(data, { chunkSize: session.chunkSize, mapping }));
    const response = await session.send('cutout write', request.path, {
        method: request.method,
        headers: request.headers,
        body,
        duplex: 'half',
    });
    // nothing of interest in the body, but it must be consumed for the connection to be reused
    await response.arrayBuffer();
    session.logger.debug(`wrote ${request.byteLength} bytes to ${request.path}`);
}
