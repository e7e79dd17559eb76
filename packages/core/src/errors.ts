export class CutoutError extends Error {
    override name = 'CutoutError';
}

/** a metadata document (or option object) is missing fields, has fields of the wrong type, or breaks an invariant */
export class SchemaError extends CutoutError {
    override name = 'SchemaError';
}

export class ConfigError extends CutoutError {
    override name = 'ConfigError';
}

/** two axis label sets that must describe the same axes do not */
export class AxisMismatchError extends CutoutError {
    override name = 'AxisMismatchError';
}

/** a requested region has the wrong rank, or reaches outside of the volume */
export class BoundsError extends CutoutError {
    override name = 'BoundsError';
}

export class ShapeMismatchError extends CutoutError {
    override name = 'ShapeMismatchError';
}

export class DtypeMismatchError extends CutoutError {
    override name = 'DtypeMismatchError';
}

/** a payload stream ended before the declared number of bytes arrived */
export class TruncatedPayloadError extends CutoutError {
    override name = 'TruncatedPayloadError';
}

/** a payload stream carried more bytes than declared */
export class OversizedPayloadError extends CutoutError {
    override name = 'OversizedPayloadError';
}

export class UnsupportedSliceError extends CutoutError {
    override name = 'UnsupportedSliceError';
}

/** no dataset, node or volume exists under the requested name */
export class NotFoundError extends CutoutError {
    override name = 'NotFoundError';
}

export class ConflictError extends CutoutError {
    override name = 'ConflictError';
}

/** the request itself is malformed: bad path, bad method, missing headers */
export class RequestError extends CutoutError {
    override name = 'RequestError';
}

export class SessionClosedError extends CutoutError {
    override name = 'SessionClosedError';
}

/**
 * the server answered, but not in the way the protocol says it should (eg. a body where none was expected)
 */
export class UnexpectedResponseError extends CutoutError {
    override name = 'UnexpectedResponseError';
}

export type CutoutHttpErrorDetails = {
    action: string;
    status: number;
    statusText: string;
    method: string;
    path: string;
    // the error kind and message reported in the response body, when the server sent one
    kind?: string | undefined;
    detail?: string | undefined;
};

/**
 * the server answered a request with a non-2xx status
 */
export class CutoutHttpError extends CutoutError {
    override name = 'CutoutHttpError';
    readonly status: number;
    readonly method: string;
    readonly path: string;
    readonly kind: string | undefined;
    readonly detail: string | undefined;

    constructor(details: CutoutHttpErrorDetails) {
        const { action, status, statusText, method, path, kind, detail } = details;
        const lines = [
            `while attempting "${action}" the server returned an error: ${status} ${statusText}`,
            `request: ${method} ${path}`,
        ];
        if (kind !== undefined || detail !== undefined) {
            lines.push(`response: [${kind ?? 'unknown'}] ${detail ?? ''}`);
        }
        super(lines.join('\n'));
        this.status = status;
        this.method = method;
        this.path = path;
        this.kind = kind;
        this.detail = detail;
    }
}
