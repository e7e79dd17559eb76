export type { CutoutStore, VolumeHandle, NodeRecord, DatasetRecord } from './store';
export { ZarrCutoutStore, directoryStore } from './zarr-store';
export { KeyedMutex, type Release } from './lock';
export { type Route, type RouteKind, parseRoute, allowedMethods, parseIntegerList, checkDims } from './routes';
export {
    MethodNotAllowedError,
    LengthRequiredError,
    INTERNAL_ERROR,
    statusOf,
    jsonResponse,
    noContent,
    errorResponse,
} from './responses';
export {
    SERVER_NAME,
    SERVER_VERSION,
    type EnginePhase,
    type Exchange,
    type MockServerEngineOptions,
    slabsOf,
    MockServerEngine,
} from './engine';
export { type RunningServer, type ServeOptions, toWebRequest, serve } from './http';
