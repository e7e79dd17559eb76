import { RequestError } from '@cutout/core';

export type Route =
    | { kind: 'server-info' }
    | { kind: 'datasets-list' }
    | { kind: 'datasets-info' }
    | { kind: 'create-volume'; uuid: string; typename: string; name: string }
    | { kind: 'metadata'; uuid: string; name: string }
    | { kind: 'raw'; uuid: string; name: string; dims: string; shape: string; offset: string }
    | { kind: 'create-instance'; uuid: string }
    | { kind: 'keys'; uuid: string; name: string }
    | { kind: 'value'; uuid: string; name: string; key: string };

export type RouteKind = Route['kind'];

const METHODS: Record<RouteKind, ReadonlyArray<string>> = {
    'server-info': ['GET'],
    'datasets-list': ['GET'],
    'datasets-info': ['GET'],
    'create-volume': ['POST'],
    metadata: ['GET'],
    raw: ['GET', 'POST'],
    'create-instance': ['POST'],
    keys: ['GET'],
    value: ['GET', 'POST'],
};

// fourth segments of /api/node/<uuid>/<name>/... that are endpoints rather than keyvalue keys
const RESERVED_KEYS: ReadonlySet<string> = new Set(['metadata', 'raw', 'keys']);

export function allowedMethods(route: Route): ReadonlyArray<string> {
    return METHODS[route.kind];
}

function decodeSegment(segment: string) {
    try {
        return decodeURIComponent(segment);
    } catch (e) {
        throw new RequestError(`malformed path segment "${segment}"`, { cause: e });
    }
}

/**
 * @throws RequestError if the path matches no endpoint
 */
export function parseRoute(pathname: string): Route {
    const segments = pathname.split('/').filter((s) => s.length > 0).map(decodeSegment);
    const [api, ...rest] = segments;
    if (api === 'api') {
        const [first, second, third, fourth, fifth, sixth, seventh, ...extra] = rest;
        if (first === 'server' && second === 'info' && rest.length === 2) {
            return { kind: 'server-info' };
        }
        if (first === 'datasets' && rest.length === 2) {
            if (second === 'list') return { kind: 'datasets-list' };
            if (second === 'info') return { kind: 'datasets-info' };
        }
        if (first === 'dataset' && third === 'new' && rest.length === 5 && second && fourth && fifth) {
            return { kind: 'create-volume', uuid: second, typename: fourth, name: fifth };
        }
        if (first === 'repo' && third === 'instance' && rest.length === 3 && second) {
            return { kind: 'create-instance', uuid: second };
        }
        if (first === 'node' && second && third) {
            if (fourth === 'metadata' && rest.length === 4) {
                return { kind: 'metadata', uuid: second, name: third };
            }
            if (fourth === 'raw' && fifth && sixth && seventh && extra.length === 0) {
                return { kind: 'raw', uuid: second, name: third, dims: fifth, shape: sixth, offset: seventh };
            }
            if (fourth === 'keys' && rest.length === 4) {
                return { kind: 'keys', uuid: second, name: third };
            }
            if (fourth && rest.length === 4 && !RESERVED_KEYS.has(fourth)) {
                return { kind: 'value', uuid: second, name: third, key: fourth };
            }
        }
    }
    throw new RequestError(`no endpoint at ${pathname}`);
}

/**
 * parse a list of non-negative integers separated by "_" or ","
 * @example parseIntegerList('10_20,30') // [10, 20, 30]
 */
export function parseIntegerList(text: string, what: string): number[] {
    const parts = text.split(/[_,]/);
    if (parts.some((p) => !/^\d+$/.test(p))) {
        throw new RequestError(`${what} must be non-negative integers separated by "_" or ",", got "${text}"`);
    }
    return parts.map(Number);
}

/**
 * check the dims segment of a cutout path against the spatial axes of a volume. Accepted forms are
 * the index list ("0_1_2") and the spatial labels in order ("xyz", "x_y_z", case-insensitive).
 */
export function checkDims(text: string, spatialLabels: ReadonlyArray<string>) {
    const parts = /[_,]/.test(text) || /^\d+$/.test(text) ? text.split(/[_,]/) : [...text];
    const matches =
        parts.length === spatialLabels.length &&
        parts.every((part, i) => part === `${i}` || part.toLowerCase() === spatialLabels[i]);
    if (!matches) {
        throw new RequestError(
            `dims "${text}" do not match the volume's axes: expected "${spatialLabels.map((_, i) => i).join('_')}" or "${spatialLabels.join('')}"`,
        );
    }
}
