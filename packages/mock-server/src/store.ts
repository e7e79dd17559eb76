import type { VolumeMetadata } from '@cutout/client';
import type { boxND } from '@cutout/geometry';

export type NodeRecord = {
    dataset: string;
    uuid: string;
    parents: string[];
    children: string[];
    // data instance name -> typename
    instances: Record<string, string>;
};

export type DatasetRecord = {
    name: string;
    root: string;
    nodes: Record<string, NodeRecord>;
};

/**
 * one stored volume. Regions are always given in wire order, and bytes are the row-major wire-order payload.
 */
export interface VolumeHandle {
    readonly metadata: VolumeMetadata;
    readonly typename: string;
    readRegion(wireBox: boxND): Promise<Uint8Array>;
    writeRegion(wireBox: boxND, bytes: Uint8Array): Promise<void>;
}

/**
 * one stored keyvalue instance: opaque byte values under string keys
 */
export interface KeyValueHandle {
    keys(): Promise<string[]>;
    /**
     * @throws NotFoundError if nothing is stored under the key
     */
    get(key: string): Promise<Uint8Array>;
    put(key: string, value: Uint8Array): Promise<void>;
}

/**
 * The storage the mock server serves: datasets own nodes, nodes own data instances (volumes and keyvalue instances).
 * Nothing is ever deleted, and volumes are never resized.
 */
export interface CutoutStore {
    /**
     * @param path [] lists dataset names, [dataset] lists its node uuids, [dataset, uuid] lists the node's data instances
     * @throws NotFoundError if the path names a dataset or node that does not exist
     */
    listChildren(path: ReadonlyArray<string>): Promise<string[]>;
    getDataset(name: string): Promise<DatasetRecord>;
    findNode(uuid: string): Promise<NodeRecord | undefined>;
    /**
     * @throws NotFoundError if the node or the volume does not exist
     */
    open(uuid: string, name: string): Promise<VolumeHandle>;
    /**
     * @throws NotFoundError if the node does not exist, or has no keyvalue instance of that name
     */
    openKeyValue(uuid: string, name: string): Promise<KeyValueHandle>;

    /**
     * @returns the uuid of the new dataset's root node
     * @throws ConflictError if a dataset of that name exists
     */
    createDataset(name: string, rootUuid?: string): Promise<string>;
    /**
     * @returns the uuid of the new child node
     */
    addNode(parentUuid: string, uuid?: string): Promise<string>;
    /**
     * create a zero-filled volume
     * @throws ConflictError if the node already has a data instance of that name
     */
    createVolume(uuid: string, name: string, metadata: VolumeMetadata, typename: string): Promise<VolumeHandle>;
    /**
     * @throws ConflictError if the node already has a data instance of that name
     */
    createKeyValue(uuid: string, name: string): Promise<KeyValueHandle>;
}
