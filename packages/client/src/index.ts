export {
    VOXEL_DTYPES,
    type VoxelDtype,
    type VoxelTypedArray,
    type NdArray,
    isVoxelDtype,
    itemSize,
    product,
    byteLength,
    typedArrayFor,
    dtypeOf,
    bytesOf,
    fromBytes,
    zeros,
    ndarray,
    reshape,
    assertDtype,
    leadingAxisBlock,
} from './ndarray';
export {
    CHANNEL_LABEL,
    SPATIAL_LABELS,
    type SpatialLabel,
    type AxisLabel,
    MetadataAxisSchema,
    MetadataValueSchema,
    VolumeMetadataDocumentSchema,
    type VolumeMetadataDocument,
    type VolumeMetadataFields,
    VolumeMetadata,
    parseMetadata,
    serializeMetadata,
    defaultMetadata,
    GENERIC_TYPENAME,
    determineTypename,
    isAxisLabel,
} from './metadata';
export {
    type AxisOrderMapping,
    createAxisMapping,
    axisMappingFor,
    isIdentityMapping,
    permuteToWire,
    permuteToCanonical,
    toWireOrder,
    toCanonicalOrder,
    computeStrides,
} from './axes';
export {
    VOLUME_MIMETYPE,
    type VolumeId,
    type CutoutMethod,
    type CutoutRequest,
    type ByteSource,
    type StreamOptions,
    volumeContentType,
    volumePath,
    buildRequest,
    decodeStream,
    encodeStream,
    toReadableStream,
} from './codec';
export { type FetchLike, type SessionOptions, CutoutSession, openSession, withSession } from './session';
export {
    DatasetsListSchema,
    type DatasetsList,
    DataInstanceInfoSchema,
    NodeInfoSchema,
    type NodeInfo,
    DatasetInfoSchema,
    type DatasetInfo,
    DatasetsInfoSchema,
    type DatasetsInfo,
    ServerInfoSchema,
    type ServerInfo,
    getServerInfo,
    getDatasetsList,
    getDatasetsInfo,
} from './general';
export { getMetadata, createVolume, readCutout, writeCutout } from './voxels';
export {
    ELLIPSIS,
    type SliceRange,
    type SliceItem,
    type Slicing,
    type ResolvedSlicing,
    slice,
    expandSlicing,
    resolveSlicing,
    resultShape,
} from './slicing';
export { VolumeAccessor } from './accessor';
export {
    KEYVALUE_TYPENAME,
    InstanceConfigSchema,
    type InstanceConfig,
    KeysSchema,
    type ValueBody,
    type KeyValueId,
    createKeyValue,
    getValueResponse,
    getValue,
    putValue,
    getKeys,
} from './keyvalue';
