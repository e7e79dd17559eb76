import { randomUUID } from 'node:crypto';
import {
    axisMappingFor,
    bytesOf,
    computeStrides,
    fromBytes,
    KEYVALUE_TYPENAME,
    parseMetadata,
    permuteToWire,
    serializeMetadata,
    type VolumeMetadata,
    VolumeMetadataDocumentSchema,
} from '@cutout/client';
import { ConflictError, CutoutError, logger, NotFoundError, RequestError } from '@cutout/core';
import { BoxND, type boxND } from '@cutout/geometry';
import type { Mutable } from '@zarrita/storage';
import FileSystemStore from '@zarrita/storage/fs';
import * as zarr from 'zarrita';
import { z, ZodError } from 'zod';
import { KeyedMutex } from './lock';
import type { CutoutStore, DatasetRecord, KeyValueHandle, NodeRecord, VolumeHandle } from './store';

// bookkeeping lives in group attributes, since zarr v3 stores cannot list their children
const RootAttrsSchema = z.object({
    datasets: z.record(z.string(), z.string()).default({}),
});

const NodeAttrsSchema = z.object({
    parents: z.string().array(),
    children: z.string().array(),
    instances: z.record(z.string(), z.string()),
});

const DatasetAttrsSchema = z.object({
    root: z.string(),
    nodes: z.record(z.string(), NodeAttrsSchema),
});
type DatasetAttrs = z.infer<typeof DatasetAttrsSchema>;

const KeyValueAttrsSchema = z.object({
    typename: z.literal(KEYVALUE_TYPENAME),
    keys: z.string().array(),
});

const VolumeAttrsSchema = z.object({
    typename: z.string(),
    metadata: VolumeMetadataDocumentSchema,
});

// the longest edge of a stored zarr chunk
const CHUNK_EDGE = 64;

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function checkName(kind: string, name: string) {
    if (!NAME_PATTERN.test(name)) {
        throw new RequestError(`invalid ${kind} name: "${name}"`);
    }
}

function checkKey(key: string) {
    if (key === '' || key === '.' || key === '..') {
        throw new RequestError(`invalid key: "${key}"`);
    }
}

function checkFree(node: NodeRecord, name: string) {
    if (name in node.instances) {
        throw new ConflictError(`node "${node.uuid}" already has a data instance named "${name}"`);
    }
}

function newUuid() {
    return randomUUID().replace(/-/g, '');
}

function selectionOf(box: boxND) {
    return box.start.map((start, i) => zarr.slice(start, box.stop[i]));
}

function parseAttrs<Schema extends z.ZodTypeAny>(schema: Schema, attrs: unknown, where: string): z.output<Schema> {
    try {
        return schema.parse(attrs);
    } catch (e) {
        if (e instanceof ZodError) {
            logger.error(`corrupt store: could not parse the attributes of ${where}`);
            throw new CutoutError(`the attributes of ${where} are not in the expected form`, { cause: e });
        }
        throw e;
    }
}

class ZarrVolume implements VolumeHandle {
    readonly metadata: VolumeMetadata;
    readonly typename: string;
    #array: zarr.Array<zarr.DataType, Mutable>;

    constructor(metadata: VolumeMetadata, typename: string, array: zarr.Array<zarr.DataType, Mutable>) {
        this.metadata = metadata;
        this.typename = typename;
        this.#array = array;
    }

    async readRegion(wireBox: boxND): Promise<Uint8Array> {
        const result = await zarr.get(this.#array, selectionOf(wireBox));
        if (typeof result !== 'object' || result === null || !('data' in result) || !ArrayBuffer.isView(result.data)) {
            throw new CutoutError(`volume of type ${this.metadata.dtype} returned non-numeric data`);
        }
        return bytesOf(result.data);
    }

    async writeRegion(wireBox: boxND, bytes: Uint8Array): Promise<void> {
        const shape = BoxND.shape(wireBox);
        const data = fromBytes(this.metadata.dtype, bytes);
        await zarr.set(this.#array, selectionOf(wireBox), { data, shape, stride: computeStrides(shape, 1) });
    }
}

/**
 * a group whose attributes hold the key list, with each value kept whole under `values/`
 */
class ZarrKeyValue implements KeyValueHandle {
    #location: zarr.Location<Mutable>;
    #where: string;
    // guards read-modify-write of the key list
    #keyList = new KeyedMutex();

    constructor(location: zarr.Location<Mutable>, where: string) {
        this.#location = location;
        this.#where = where;
    }

    #valueKey(key: string) {
        return this.#location.resolve(`values/${encodeURIComponent(key)}`).path;
    }

    async keys(): Promise<string[]> {
        const group = await zarr.open.v3(this.#location, { kind: 'group' });
        return parseAttrs(KeyValueAttrsSchema, group.attrs, this.#where).keys;
    }

    async get(key: string): Promise<Uint8Array> {
        checkKey(key);
        const value = await this.#location.store.get(this.#valueKey(key));
        if (value === undefined) {
            throw new NotFoundError(`${this.#where} has no key "${key}"`);
        }
        return value;
    }

    async put(key: string, value: Uint8Array): Promise<void> {
        checkKey(key);
        await this.#location.store.set(this.#valueKey(key), value);
        await this.#keyList.withLock('keys', async () => {
            const keys = await this.keys();
            if (!keys.includes(key)) {
                await zarr.create(this.#location, { attributes: { typename: KEYVALUE_TYPENAME, keys: [...keys, key] } });
            }
        });
    }
}

/**
 * A CutoutStore on any zarrita store: a Map for tests, or a directory through @zarrita/storage's FileSystemStore.
 * The layout is `/datasets/<dataset>/<node uuid>/<instance>`: every volume is a zarr array in wire order,
 * and every keyvalue instance a zarr group.
 */
export class ZarrCutoutStore implements CutoutStore {
    #root: zarr.Location<Mutable>;
    // guards read-modify-write of the bookkeeping attributes
    #hierarchy = new KeyedMutex();
    // one handle per instance, so that every writer shares its key list lock
    #keyValues = new Map<string, ZarrKeyValue>();

    constructor(store: Mutable) {
        this.#root = zarr.root(store);
    }

    async #readGroupAttrs(path: string): Promise<unknown> {
        const group = await zarr.open.v3(this.#root.resolve(path), { kind: 'group' });
        return group.attrs;
    }

    async #datasets(): Promise<Record<string, string>> {
        const key = this.#root.resolve('zarr.json').path;
        if ((await this.#root.store.get(key)) === undefined) {
            return {};
        }
        return parseAttrs(RootAttrsSchema, await this.#readGroupAttrs('/'), 'the store root').datasets;
    }

    async #datasetAttrs(name: string): Promise<DatasetAttrs> {
        const datasets = await this.#datasets();
        if (!(name in datasets)) {
            throw new NotFoundError(`no dataset named "${name}"`);
        }
        return parseAttrs(DatasetAttrsSchema, await this.#readGroupAttrs(`datasets/${name}`), `dataset "${name}"`);
    }

    async #writeDatasetAttrs(name: string, attrs: DatasetAttrs) {
        await zarr.create(this.#root.resolve(`datasets/${name}`), { attributes: attrs });
    }

    async #requireNode(uuid: string): Promise<NodeRecord> {
        const node = await this.findNode(uuid);
        if (!node) {
            throw new NotFoundError(`no node with uuid "${uuid}"`);
        }
        return node;
    }

    async listChildren(path: ReadonlyArray<string>): Promise<string[]> {
        const [dataset, uuid, ...rest] = path;
        if (dataset === undefined) {
            return Object.keys(await this.#datasets());
        }
        const { nodes } = await this.#datasetAttrs(dataset);
        if (uuid === undefined) {
            return Object.keys(nodes);
        }
        const node = nodes[uuid];
        if (node === undefined || rest.length > 0) {
            throw new NotFoundError(`nothing at /${path.join('/')}`);
        }
        return Object.keys(node.instances);
    }

    async getDataset(name: string): Promise<DatasetRecord> {
        const { root, nodes } = await this.#datasetAttrs(name);
        const records: Record<string, NodeRecord> = {};
        for (const [uuid, node] of Object.entries(nodes)) {
            records[uuid] = { dataset: name, uuid, ...node };
        }
        return { name, root, nodes: records };
    }

    async findNode(uuid: string): Promise<NodeRecord | undefined> {
        for (const name of Object.keys(await this.#datasets())) {
            const node = (await this.#datasetAttrs(name)).nodes[uuid];
            if (node !== undefined) {
                return { dataset: name, uuid, ...node };
            }
        }
        return undefined;
    }

    async open(uuid: string, name: string): Promise<VolumeHandle> {
        const node = await this.#requireNode(uuid);
        const typename = node.instances[name];
        if (typename === undefined || typename === KEYVALUE_TYPENAME) {
            throw new NotFoundError(`node "${uuid}" has no volume named "${name}"`);
        }
        const where = `volume "${uuid}/${name}"`;
        const array = await zarr.open.v3(this.#root.resolve(`datasets/${node.dataset}/${uuid}/${name}`), {
            kind: 'array',
        });
        const attrs = parseAttrs(VolumeAttrsSchema, array.attrs, where);
        return new ZarrVolume(parseMetadata(attrs.metadata), attrs.typename, array);
    }

    async createDataset(name: string, rootUuid: string = newUuid()): Promise<string> {
        checkName('dataset', name);
        checkName('node', rootUuid);
        return this.#hierarchy.withLock('hierarchy', async () => {
            const datasets = await this.#datasets();
            if (name in datasets) {
                throw new ConflictError(`a dataset named "${name}" already exists`);
            }
            if (await this.findNode(rootUuid)) {
                throw new ConflictError(`a node with uuid "${rootUuid}" already exists`);
            }
            await this.#writeDatasetAttrs(name, {
                root: rootUuid,
                nodes: { [rootUuid]: { parents: [], children: [], instances: {} } },
            });
            await zarr.create(this.#root.resolve(`datasets/${name}/${rootUuid}`), { attributes: {} });
            await zarr.create(this.#root, { attributes: { datasets: { ...datasets, [name]: rootUuid } } });
            logger.debug(`created dataset ${name} with root node ${rootUuid}`);
            return rootUuid;
        });
    }

    async addNode(parentUuid: string, uuid: string = newUuid()): Promise<string> {
        checkName('node', uuid);
        return this.#hierarchy.withLock('hierarchy', async () => {
            const parent = await this.#requireNode(parentUuid);
            if (await this.findNode(uuid)) {
                throw new ConflictError(`a node with uuid "${uuid}" already exists`);
            }
            const attrs = await this.#datasetAttrs(parent.dataset);
            attrs.nodes[parentUuid].children.push(uuid);
            attrs.nodes[uuid] = { parents: [parentUuid], children: [], instances: {} };
            await zarr.create(this.#root.resolve(`datasets/${parent.dataset}/${uuid}`), { attributes: {} });
            await this.#writeDatasetAttrs(parent.dataset, attrs);
            return uuid;
        });
    }

    async createVolume(uuid: string, name: string, metadata: VolumeMetadata, typename: string): Promise<VolumeHandle> {
        checkName('volume', name);
        await this.#hierarchy.withLock('hierarchy', async () => {
            const node = await this.#requireNode(uuid);
            checkFree(node, name);
            const wireShape = permuteToWire(metadata.shape, axisMappingFor(metadata));
            await zarr.create(this.#root.resolve(`datasets/${node.dataset}/${uuid}/${name}`), {
                shape: wireShape,
                chunk_shape: wireShape.map((n) => Math.min(n, CHUNK_EDGE)),
                data_type: metadata.dtype,
                codecs: [],
                // a number, even for 64-bit types: the metadata document is plain JSON
                fill_value: 0,
                attributes: { typename, metadata: serializeMetadata(metadata) },
            });
            const attrs = await this.#datasetAttrs(node.dataset);
            attrs.nodes[uuid].instances[name] = typename;
            await this.#writeDatasetAttrs(node.dataset, attrs);
            logger.debug(`created volume ${uuid}/${name} of ${metadata.dtype} [${wireShape.join(',')}] (wire order)`);
        });
        return this.open(uuid, name);
    }

    async openKeyValue(uuid: string, name: string): Promise<KeyValueHandle> {
        const node = await this.#requireNode(uuid);
        if (node.instances[name] !== KEYVALUE_TYPENAME) {
            throw new NotFoundError(`node "${uuid}" has no keyvalue instance named "${name}"`);
        }
        return this.#keyValue(node, name);
    }

    async createKeyValue(uuid: string, name: string): Promise<KeyValueHandle> {
        checkName('keyvalue', name);
        return this.#hierarchy.withLock('hierarchy', async () => {
            const node = await this.#requireNode(uuid);
            checkFree(node, name);
            const keyValue = this.#keyValue(node, name);
            await zarr.create(this.#root.resolve(`datasets/${node.dataset}/${uuid}/${name}`), {
                attributes: { typename: KEYVALUE_TYPENAME, keys: [] },
            });
            const attrs = await this.#datasetAttrs(node.dataset);
            attrs.nodes[uuid].instances[name] = KEYVALUE_TYPENAME;
            await this.#writeDatasetAttrs(node.dataset, attrs);
            logger.debug(`created keyvalue instance ${uuid}/${name}`);
            return keyValue;
        });
    }

    #keyValue(node: NodeRecord, name: string) {
        const key = `${node.uuid}/${name}`;
        let keyValue = this.#keyValues.get(key);
        if (keyValue === undefined) {
            keyValue = new ZarrKeyValue(this.#root.resolve(`datasets/${node.dataset}/${key}`), `keyvalue "${key}"`);
            this.#keyValues.set(key, keyValue);
        }
        return keyValue;
    }
}

/**
 * a store kept in a directory on disk, so that its data outlives the process
 */
export function directoryStore(directory: string): ZarrCutoutStore {
    return new ZarrCutoutStore(new FileSystemStore(directory));
}
