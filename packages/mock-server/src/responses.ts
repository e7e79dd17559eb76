import {
    BoundsError,
    ConflictError,
    DtypeMismatchError,
    NotFoundError,
    OversizedPayloadError,
    RequestError,
    SchemaError,
    ShapeMismatchError,
    TruncatedPayloadError,
} from '@cutout/core';

export class MethodNotAllowedError extends RequestError {
    readonly allowed: ReadonlyArray<string>;

    constructor(method: string, path: string, allowed: ReadonlyArray<string>) {
        super(`${method} is not allowed on ${path}; use ${allowed.join(' or ')}`);
        this.allowed = allowed;
    }
}

export class LengthRequiredError extends RequestError {}

type ErrorClass = new (...args: never[]) => Error;

// first match wins, so subclasses come before their base classes
const STATUSES: ReadonlyArray<{ type: ErrorClass; status: number; kind: string }> = [
    { type: MethodNotAllowedError, status: 405, kind: 'RequestError' },
    { type: LengthRequiredError, status: 411, kind: 'RequestError' },
    { type: RequestError, status: 400, kind: 'RequestError' },
    { type: BoundsError, status: 400, kind: 'BoundsError' },
    { type: SchemaError, status: 400, kind: 'SchemaError' },
    { type: TruncatedPayloadError, status: 400, kind: 'TruncatedPayloadError' },
    { type: OversizedPayloadError, status: 400, kind: 'OversizedPayloadError' },
    { type: ShapeMismatchError, status: 400, kind: 'ShapeMismatchError' },
    { type: NotFoundError, status: 404, kind: 'NotFoundError' },
    { type: ConflictError, status: 409, kind: 'ConflictError' },
    { type: DtypeMismatchError, status: 415, kind: 'DtypeMismatchError' },
];

export const INTERNAL_ERROR = 'InternalError';

/**
 * @returns the status and error kind the server answers with when handling a request fails with the given error
 */
export function statusOf(error: unknown): { status: number; kind: string } {
    const match = STATUSES.find(({ type }) => error instanceof type);
    return match ? { status: match.status, kind: match.kind } : { status: 500, kind: INTERNAL_ERROR };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { ...headers, 'Content-Type': 'application/json' },
    });
}

export function noContent(): Response {
    return new Response(null, { status: 204 });
}

export function errorResponse(error: unknown): Response {
    const { status, kind } = statusOf(error);
    const message = error instanceof Error ? error.message : String(error);
    const headers: Record<string, string> =
        error instanceof MethodNotAllowedError ? { Allow: error.allowed.join(', ') } : {};
    return jsonResponse({ error: kind, message }, status, headers);
}
