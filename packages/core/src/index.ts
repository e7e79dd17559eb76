export {
    CutoutError,
    SchemaError,
    ConfigError,
    AxisMismatchError,
    BoundsError,
    ShapeMismatchError,
    DtypeMismatchError,
    TruncatedPayloadError,
    OversizedPayloadError,
    UnsupportedSliceError,
    NotFoundError,
    ConflictError,
    RequestError,
    SessionClosedError,
    UnexpectedResponseError,
    CutoutHttpError,
    type CutoutHttpErrorDetails,
} from './errors';
export { Logger, createLogger, logger, isLogLevel, LOG_LEVELS, type LogLevel, type LogSink, type LoggerOptions } from './logger';
export {
    DEFAULT_CHUNK_SIZE,
    LogLevelSchema,
    ClientOptionsSchema,
    MockServerOptionsSchema,
    parseOptions,
    type ClientOptions,
    type ResolvedClientOptions,
    type MockServerOptions,
    type ResolvedMockServerOptions,
} from './options';
