import { UnexpectedResponseError } from '@cutout/core';
import { z } from 'zod';
import { VOLUME_MIMETYPE, volumePath, type VolumeId } from './codec';
import type { CutoutSession } from './session';

export const KEYVALUE_TYPENAME = 'keyvalue';

/**
 * the body of `POST /api/repo/<uuid>/instance`, which creates a data instance that is not a volume
 */
export const InstanceConfigSchema = z.object({
    dataname: z.string().min(1),
    typename: z.string().min(1),
});
export type InstanceConfig = z.infer<typeof InstanceConfigSchema>;

export const KeysSchema = z.string().array();

export type ValueBody = Uint8Array | string | ReadableStream<Uint8Array>;

// a keyvalue instance lives beside the volumes of a node, and is addressed the same way
export type KeyValueId = VolumeId;

function valuePath(instance: KeyValueId, key: string) {
    return `${volumePath(instance)}/${encodeURIComponent(key)}`;
}

async function expectEmpty(response: Response, action: string) {
    const text = await response.text();
    if (text.length > 0) {
        throw new UnexpectedResponseError(`expected an empty response to ${action}, got: ${text}`);
    }
}

/**
 * create an empty keyvalue instance under the given node
 * @throws CutoutHttpError 409 if the node already has a data instance of that name
 */
export async function createKeyValue(session: CutoutSession, instance: KeyValueId): Promise<void> {
    const config: InstanceConfig = { dataname: instance.name, typename: KEYVALUE_TYPENAME };
    const response = await session.send('create keyvalue', `/api/repo/${encodeURIComponent(instance.uuid)}/instance`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(config),
    });
    await expectEmpty(response, 'keyvalue creation');
    session.logger.info(`created keyvalue instance ${instance.uuid}/${instance.name}`);
}

/**
 * request the value stored under a key, resolving once the headers arrive.
 * The caller reads (or cancels) `response.body` itself.
 * @throws CutoutHttpError 404 if there is no such key
 */
export function getValueResponse(session: CutoutSession, instance: KeyValueId, key: string): Promise<Response> {
    return session.send('keyvalue read', valuePath(instance, key));
}

export async function getValue(session: CutoutSession, instance: KeyValueId, key: string): Promise<Uint8Array> {
    const response = await getValueResponse(session, instance, key);
    return new Uint8Array(await response.arrayBuffer());
}

/**
 * store a value under a key, replacing any value already there. Strings are sent as UTF-8.
 */
export async function putValue(
    session: CutoutSession,
    instance: KeyValueId,
    key: string,
    value: ValueBody,
): Promise<void> {
    const body = typeof value === 'string' ? new TextEncoder().encode(value) : value;
    const headers: Record<string, string> = { 'Content-Type': VOLUME_MIMETYPE };
    if (body instanceof Uint8Array) {
        headers['Content-Length'] = `${body.byteLength}`;
    }
    const response = await session.send('keyvalue write', valuePath(instance, key), {
        method: 'POST',
        headers,
        body,
        duplex: 'half',
    });
    await expectEmpty(response, 'keyvalue write');
}

/**
 * @returns every key of the instance, in the order they were first written
 */
export function getKeys(session: CutoutSession, instance: KeyValueId): Promise<string[]> {
    return session.getJson('keyvalue keys', `${volumePath(instance)}/keys`, KeysSchema);
}
