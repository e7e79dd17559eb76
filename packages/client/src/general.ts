import { z } from 'zod';
import type { CutoutSession } from './session';

// dataset name -> uuid of the dataset's root node
export const DatasetsListSchema = z.record(z.string(), z.string());
export type DatasetsList = z.infer<typeof DatasetsListSchema>;

export const DataInstanceInfoSchema = z.object({
    Name: z.string(),
    TypeName: z.string(),
});

export const NodeInfoSchema = z.object({
    Parents: z.string().array(),
    Children: z.string().array(),
    DataMap: z.record(z.string(), DataInstanceInfoSchema),
});
export type NodeInfo = z.infer<typeof NodeInfoSchema>;

export const DatasetInfoSchema = z.object({
    Root: z.string(),
    Nodes: z.record(z.string(), NodeInfoSchema),
});
export type DatasetInfo = z.infer<typeof DatasetInfoSchema>;

export const DatasetsInfoSchema = z.record(z.string(), DatasetInfoSchema);
export type DatasetsInfo = z.infer<typeof DatasetsInfoSchema>;

export const ServerInfoSchema = z.object({
    Server: z.string(),
    Version: z.string(),
});
export type ServerInfo = z.infer<typeof ServerInfoSchema>;

export function getServerInfo(session: CutoutSession): Promise<ServerInfo> {
    return session.getJson('server info', '/api/server/info', ServerInfoSchema);
}

/**
 * @returns every dataset on the server, with the uuid of its root node
 */
export function getDatasetsList(session: CutoutSession): Promise<DatasetsList> {
    return session.getJson('datasets list', '/api/datasets/list', DatasetsListSchema);
}

/**
 * @returns every dataset on the server, with its node hierarchy and the volumes of each node
 */
export function getDatasetsInfo(session: CutoutSession): Promise<DatasetsInfo> {
    return session.getJson('datasets info', '/api/datasets/info', DatasetsInfoSchema);
}
