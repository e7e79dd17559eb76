import {
    axisMappingFor,
    byteLength,
    determineTypename,
    GENERIC_TYPENAME,
    InstanceConfigSchema,
    itemSize,
    KEYVALUE_TYPENAME,
    parseMetadata,
    serializeMetadata,
    toWireOrder,
    type VolumeMetadata,
    VOLUME_MIMETYPE,
    type VoxelDtype,
    volumeContentType,
} from '@cutout/client';
import {
    BoundsError,
    createLogger,
    DtypeMismatchError,
    type Logger,
    type MockServerOptions,
    MockServerOptionsSchema,
    OversizedPayloadError,
    parseOptions,
    RequestError,
    type ResolvedMockServerOptions,
    SchemaError,
    ShapeMismatchError,
    TruncatedPayloadError,
} from '@cutout/core';
import { BoxND, type boxND } from '@cutout/geometry';
import { once, uniqueId } from 'lodash';
import { KeyedMutex } from './lock';
import { errorResponse, jsonResponse, LengthRequiredError, MethodNotAllowedError, noContent, statusOf } from './responses';
import { allowedMethods, checkDims, parseIntegerList, parseRoute, type Route } from './routes';
import type { CutoutStore, VolumeHandle } from './store';
import { ZarrCutoutStore } from './zarr-store';

export const SERVER_NAME = 'cutout-mock-server';
export const SERVER_VERSION = '0.1.0';

/**
 * every request moves idle -> parsing -> serving -> idle; a request that fails while parsing goes straight back to idle
 */
export type EnginePhase = 'idle' | 'parsing' | 'serving';

export type Exchange = {
    readonly id: string;
    readonly method: string;
    readonly path: string;
    phase: EnginePhase;
};

export type MockServerEngineOptions = MockServerOptions & {
    // defaults to an empty in-memory zarr store
    store?: CutoutStore | undefined;
};

type Cutout = {
    wireBox: boxND;
    byteLength: number;
};

type Handled = {
    response: Response;
    // when set, the exchange ends once the response body has been streamed, not when the response is returned
    streaming: boolean;
};

/**
 * split a region along its first (slowest-varying) axis into slabs of at most chunkSize bytes each.
 * A slab is never thinner than 1, so a single row larger than chunkSize makes a slab of its own.
 */
export function slabsOf(box: boxND, size: number, chunkSize: number): boxND[] {
    if (BoxND.isEmpty(box)) {
        return [];
    }
    const [rows, ...rest] = BoxND.shape(box);
    const rowBytes = rest.reduce((bytes, n) => bytes * n, size);
    const thickness = Math.max(1, Math.floor(chunkSize / rowBytes));
    const slabs: boxND[] = [];
    for (let from = 0; from < rows; from += thickness) {
        slabs.push(BoxND.slab(box, 0, from, Math.min(from + thickness, rows)));
    }
    return slabs;
}

function* piecesOf(bytes: Uint8Array, chunkSize: number) {
    for (let start = 0; start < bytes.byteLength; start += chunkSize) {
        yield bytes.subarray(start, Math.min(start + chunkSize, bytes.byteLength));
    }
}

// "application/octet-stream; dtype=uint8" -> "uint8"
function dtypeParameter(contentType: string | null): string | undefined {
    const match = contentType?.match(/(?:^|;)\s*dtype=([A-Za-z0-9]+)/);
    return match?.[1];
}

/**
 * Serves the cutout REST api from a CutoutStore, over web-standard Request and Response objects:
 * pass `engine.asFetch()` to a client session to talk to it in-process, or use `serve` to put it behind node:http.
 * Bad requests get a JSON error response with a deterministic status, and never bring the engine down.
 */
export class MockServerEngine {
    readonly store: CutoutStore;
    readonly options: ResolvedMockServerOptions;
    readonly logger: Logger;
    #locks = new KeyedMutex();
    #exchanges = new Map<string, Exchange>();

    constructor(options: MockServerEngineOptions = {}) {
        const { store, ...rest } = options;
        this.options = parseOptions(MockServerOptionsSchema, rest);
        this.store = store ?? new ZarrCutoutStore(new Map());
        this.logger = createLogger(SERVER_NAME, { level: this.options.logLevel });
    }

    /**
     * idle when no request is in flight, serving when any request is streaming, parsing otherwise
     */
    get phase(): EnginePhase {
        const phases = [...this.#exchanges.values()].map((e) => e.phase);
        if (phases.length === 0) return 'idle';
        return phases.includes('serving') ? 'serving' : 'parsing';
    }

    inFlight(): ReadonlyArray<Readonly<Exchange>> {
        return [...this.#exchanges.values()].map((e) => ({ ...e }));
    }

    asFetch(): (request: Request) => Promise<Response> {
        return (request) => this.handle(request);
    }

    createDataset(name: string, rootUuid?: string): Promise<string> {
        return this.store.createDataset(name, rootUuid);
    }

    addNode(parentUuid: string, uuid?: string): Promise<string> {
        return this.store.addNode(parentUuid, uuid);
    }

    createVolume(uuid: string, name: string, metadata: VolumeMetadata): Promise<VolumeHandle> {
        return this.#locks.withLock(`${uuid}/${name}`, () =>
            this.store.createVolume(uuid, name, metadata, determineTypename(metadata)),
        );
    }

    #begin(request: Request, path: string): Exchange {
        const exchange: Exchange = { id: uniqueId('request-'), method: request.method, path, phase: 'parsing' };
        this.#exchanges.set(exchange.id, exchange);
        this.logger.debug(`${exchange.id} ${exchange.method} ${path}: idle -> parsing`);
        return exchange;
    }

    #serve(exchange: Exchange) {
        exchange.phase = 'serving';
        this.logger.debug(`${exchange.id}: parsing -> serving`);
    }

    #end(exchange: Exchange) {
        if (this.#exchanges.delete(exchange.id)) {
            this.logger.debug(`${exchange.id}: ${exchange.phase} -> idle`);
        }
    }

    /**
     * answer one request. Never rejects: every failure becomes an error response.
     */
    async handle(request: Request): Promise<Response> {
        const path = new URL(request.url).pathname;
        const exchange = this.#begin(request, path);
        let streaming = false;
        try {
            const route = parseRoute(path);
            const allowed = allowedMethods(route);
            if (!allowed.includes(request.method)) {
                throw new MethodNotAllowedError(request.method, path, allowed);
            }
            const handled = await this.#dispatch(route, request, exchange);
            streaming = handled.streaming;
            this.logger.info(`${request.method} ${path} ${handled.response.status}`);
            return handled.response;
        } catch (e) {
            const { status, kind } = statusOf(e);
            const message = `${request.method} ${path} ${status} ${kind}: ${e instanceof Error ? e.message : String(e)}`;
            if (status >= 500) {
                this.logger.error(message);
            } else {
                this.logger.warn(message);
            }
            return errorResponse(e);
        } finally {
            if (!streaming) {
                this.#end(exchange);
            }
        }
    }

    async #dispatch(route: Route, request: Request, exchange: Exchange): Promise<Handled> {
        switch (route.kind) {
            case 'server-info':
                this.#serve(exchange);
                return { response: jsonResponse({ Server: SERVER_NAME, Version: SERVER_VERSION }), streaming: false };
            case 'datasets-list':
                this.#serve(exchange);
                return { response: jsonResponse(await this.#datasetsList()), streaming: false };
            case 'datasets-info':
                this.#serve(exchange);
                return { response: jsonResponse(await this.#datasetsInfo()), streaming: false };
            case 'create-volume':
                return { response: await this.#createVolumeFromRequest(route, request, exchange), streaming: false };
            case 'metadata': {
                const volume = await this.store.open(route.uuid, route.name);
                this.#serve(exchange);
                return { response: jsonResponse(serializeMetadata(volume.metadata)), streaming: false };
            }
            case 'raw':
                return request.method === 'GET'
                    ? { response: await this.#readRaw(route, exchange), streaming: true }
                    : { response: await this.#writeRaw(route, request, exchange), streaming: false };
            case 'create-instance':
                return { response: await this.#createInstance(route, request, exchange), streaming: false };
            case 'keys':
                return { response: await this.#keys(route, exchange), streaming: false };
            case 'value':
                return request.method === 'GET'
                    ? { response: await this.#readValue(route, exchange), streaming: false }
                    : { response: await this.#writeValue(route, request, exchange), streaming: false };
        }
    }

    async #datasetsList(): Promise<Record<string, string>> {
        const list: Record<string, string> = {};
        for (const name of await this.store.listChildren([])) {
            list[name] = (await this.store.getDataset(name)).root;
        }
        return list;
    }

    async #datasetsInfo() {
        const info: Record<string, unknown> = {};
        for (const name of await this.store.listChildren([])) {
            const dataset = await this.store.getDataset(name);
            const nodes: Record<string, unknown> = {};
            for (const [uuid, node] of Object.entries(dataset.nodes)) {
                const dataMap: Record<string, { Name: string; TypeName: string }> = {};
                for (const [instance, typename] of Object.entries(node.instances)) {
                    dataMap[instance] = { Name: instance, TypeName: typename };
                }
                nodes[uuid] = { Parents: node.parents, Children: node.children, DataMap: dataMap };
            }
            info[name] = { Root: dataset.root, Nodes: nodes };
        }
        return info;
    }

    async #createVolumeFromRequest(
        route: Extract<Route, { kind: 'create-volume' }>,
        request: Request,
        exchange: Exchange,
    ): Promise<Response> {
        const metadata = parseMetadata(await request.text());
        const expected = determineTypename(metadata);
        if (route.typename !== expected && route.typename !== GENERIC_TYPENAME) {
            throw new SchemaError(
                `typename "${route.typename}" does not fit ${metadata.channelCount} channel(s) of ${metadata.dtype}; use "${expected}"`,
            );
        }
        this.#serve(exchange);
        await this.#locks.withLock(`${route.uuid}/${route.name}`, () =>
            this.store.createVolume(route.uuid, route.name, metadata, route.typename),
        );
        return noContent();
    }

    async #createInstance(
        route: Extract<Route, { kind: 'create-instance' }>,
        request: Request,
        exchange: Exchange,
    ): Promise<Response> {
        let parsed: unknown;
        try {
            parsed = JSON.parse(await request.text());
        } catch (e) {
            throw new SchemaError('instance configuration is not JSON', { cause: e });
        }
        const result = InstanceConfigSchema.safeParse(parsed);
        if (!result.success) {
            throw new SchemaError('instance configuration needs a "dataname" and a "typename"', { cause: result.error });
        }
        const { dataname, typename } = result.data;
        if (typename !== KEYVALUE_TYPENAME) {
            throw new SchemaError(
                `cannot create a "${typename}" instance here: volumes are created through /api/dataset/<uuid>/new/<typename>/<name>`,
            );
        }
        this.#serve(exchange);
        await this.#locks.withLock(`${route.uuid}/${dataname}`, () => this.store.createKeyValue(route.uuid, dataname));
        return noContent();
    }

    async #keys(route: Extract<Route, { kind: 'keys' }>, exchange: Exchange): Promise<Response> {
        const keyValue = await this.store.openKeyValue(route.uuid, route.name);
        this.#serve(exchange);
        return jsonResponse(await keyValue.keys());
    }

    async #readValue(route: Extract<Route, { kind: 'value' }>, exchange: Exchange): Promise<Response> {
        return this.#locks.withLock(`${route.uuid}/${route.name}`, async () => {
            const keyValue = await this.store.openKeyValue(route.uuid, route.name);
            this.#serve(exchange);
            const value = await keyValue.get(route.key);
            return new Response(value, {
                status: 200,
                headers: { 'Content-Type': VOLUME_MIMETYPE, 'Content-Length': `${value.byteLength}` },
            });
        });
    }

    async #writeValue(route: Extract<Route, { kind: 'value' }>, request: Request, exchange: Exchange): Promise<Response> {
        return this.#locks.withLock(`${route.uuid}/${route.name}`, async () => {
            const keyValue = await this.store.openKeyValue(route.uuid, route.name);
            this.#serve(exchange);
            const value = new Uint8Array(await request.arrayBuffer());
            await keyValue.put(route.key, value);
            this.logger.debug(`stored ${value.byteLength} bytes under ${route.uuid}/${route.name}/${route.key}`);
            return noContent();
        });
    }

    #parseCutout(route: Extract<Route, { kind: 'raw' }>, metadata: VolumeMetadata): Cutout {
        const spatialLabels = metadata.axisLabels.slice(1);
        checkDims(route.dims, spatialLabels);
        const size = parseIntegerList(route.shape, 'shape');
        const offset = parseIntegerList(route.offset, 'offset');
        if (size.length !== spatialLabels.length || offset.length !== spatialLabels.length) {
            throw new RequestError(
                `expected ${spatialLabels.length} values for shape and offset, got ${size.length} and ${offset.length}`,
            );
        }
        const box = BoxND.fromOffsetShape([0, ...offset], [metadata.channelCount, ...size]);
        if (!BoxND.isWithin(box, metadata.shape)) {
            throw new BoundsError(
                `region at [${offset.join(',')}] of size [${size.join(',')}] is not inside volume [${metadata.shape.slice(1).join(',')}]`,
            );
        }
        const wireBox = toWireOrder(box, axisMappingFor(metadata));
        return { wireBox, byteLength: byteLength(BoxND.shape(wireBox), metadata.dtype) };
    }

    async #readRaw(route: Extract<Route, { kind: 'raw' }>, exchange: Exchange): Promise<Response> {
        const release = await this.#locks.acquire(`${route.uuid}/${route.name}`);
        try {
            const volume = await this.store.open(route.uuid, route.name);
            const { wireBox, byteLength: length } = this.#parseCutout(route, volume.metadata);
            this.#serve(exchange);
            const done = once(() => {
                release();
                this.#end(exchange);
            });
            return new Response(this.#regionStream(volume, wireBox, done), {
                status: 200,
                headers: {
                    'Content-Type': volumeContentType(volume.metadata.dtype),
                    'Content-Length': `${length}`,
                },
            });
        } catch (e) {
            release();
            throw e;
        }
    }

    #regionStream(volume: VolumeHandle, wireBox: boxND, done: () => void): ReadableStream<Uint8Array> {
        const { chunkSize } = this.options;
        const slabs = slabsOf(wireBox, itemSize(volume.metadata.dtype), chunkSize);
        let next = 0;
        let cancelled = false;
        return new ReadableStream<Uint8Array>({
            pull: async (controller) => {
                const slab = slabs[next];
                if (slab === undefined) {
                    controller.close();
                    done();
                    return;
                }
                next += 1;
                try {
                    const bytes = await volume.readRegion(slab);
                    if (cancelled) {
                        return;
                    }
                    for (const piece of piecesOf(bytes, chunkSize)) {
                        controller.enqueue(piece);
                    }
                } catch (e) {
                    this.logger.error(`reading a region failed mid-response: ${e instanceof Error ? e.message : String(e)}`);
                    controller.error(e);
                    done();
                }
            },
            cancel: () => {
                cancelled = true;
                this.logger.debug('response body cancelled by the receiver');
                done();
            },
        });
    }

    async #writeRaw(route: Extract<Route, { kind: 'raw' }>, request: Request, exchange: Exchange): Promise<Response> {
        return this.#locks.withLock(`${route.uuid}/${route.name}`, async () => {
            const volume = await this.store.open(route.uuid, route.name);
            const { wireBox, byteLength: length } = this.#parseCutout(route, volume.metadata);
            this.#checkWriteHeaders(request, volume.metadata.dtype, length);
            this.#serve(exchange);
            await this.#receiveRegion(request.body, volume, wireBox, length);
            return noContent();
        });
    }

    #checkWriteHeaders(request: Request, dtype: VoxelDtype, expected: number) {
        const declared = request.headers.get('Content-Length');
        if (declared === null) {
            throw new LengthRequiredError('cutout writes must declare a Content-Length');
        }
        if (!/^\d+$/.test(declared)) {
            throw new RequestError(`invalid Content-Length "${declared}"`);
        }
        if (Number(declared) !== expected) {
            throw new ShapeMismatchError(`Content-Length is ${declared}, but the region holds ${expected} bytes`);
        }
        const sent = dtypeParameter(request.headers.get('Content-Type'));
        if (sent !== undefined && sent !== dtype) {
            throw new DtypeMismatchError(`payload of ${sent} sent to a volume of ${dtype}`);
        }
    }

    // write the body into the store a slab at a time, as the bytes arrive
    async #receiveRegion(
        body: ReadableStream<Uint8Array> | null,
        volume: VolumeHandle,
        wireBox: boxND,
        expected: number,
    ) {
        const size = itemSize(volume.metadata.dtype);
        const slabs = slabsOf(wireBox, size, this.options.chunkSize);
        const slabBuffer = (i: number) => new Uint8Array(i < slabs.length ? BoxND.voxelCount(slabs[i]) * size : 0);
        let index = 0;
        let buffer = slabBuffer(0);
        let filled = 0;
        let received = 0;
        if (body !== null) {
            const reader = body.getReader();
            let finished = false;
            try {
                for (;;) {
                    const { done, value } = await reader.read();
                    if (done) {
                        finished = true;
                        break;
                    }
                    received += value.byteLength;
                    if (received > expected) {
                        throw new OversizedPayloadError(`request body is longer than the declared ${expected} bytes`);
                    }
                    let piece = value;
                    while (piece.byteLength > 0) {
                        const take = Math.min(piece.byteLength, buffer.byteLength - filled);
                        buffer.set(piece.subarray(0, take), filled);
                        filled += take;
                        piece = piece.subarray(take);
                        if (filled === buffer.byteLength) {
                            await volume.writeRegion(slabs[index], buffer);
                            index += 1;
                            buffer = slabBuffer(index);
                            filled = 0;
                        }
                    }
                }
            } finally {
                if (!finished) {
                    await reader.cancel();
                }
                reader.releaseLock();
            }
        }
        if (received < expected) {
            throw new TruncatedPayloadError(`request body ended after ${received} of the declared ${expected} bytes`);
        }
        this.logger.debug(`stored ${received} bytes in ${slabs.length} slab(s)`);
    }
}
