import {
    type ClientOptions,
    ClientOptionsSchema,
    createLogger,
    CutoutHttpError,
    type Logger,
    parseOptions,
    SessionClosedError,
    UnexpectedResponseError,
} from '@cutout/core';
import { uniqueId } from 'lodash';
import { z } from 'zod';

export type FetchLike = (request: Request) => Promise<Response>;

export type SessionOptions = ClientOptions & {
    // the transport; defaults to the global fetch. Tests hand in a mock server's request handler here.
    fetch?: FetchLike | undefined;
};

// error responses carry a small JSON body naming the kind of error
const ErrorBodySchema = z.object({
    error: z.string(),
    message: z.string(),
});

function parseErrorBody(text: string): z.infer<typeof ErrorBodySchema> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return { error: 'unknown', message: text };
    }
    const result = ErrorBodySchema.safeParse(parsed);
    return result.success ? result.data : { error: 'unknown', message: text };
}

/**
 * A connection to one cutout server. Every request made through a session is cancelled when the session
 * is closed, and a closed session refuses new requests. Prefer `withSession`, which always closes it.
 */
export class CutoutSession {
    readonly baseUrl: string;
    readonly chunkSize: number;
    readonly logger: Logger;
    readonly id: string;
    #fetch: FetchLike;
    #controller = new AbortController();
    #closed = false;

    constructor(options: SessionOptions) {
        const { fetch: transport, ...rest } = options;
        const { baseUrl, chunkSize, logLevel } = parseOptions(ClientOptionsSchema, rest);
        this.baseUrl = baseUrl;
        this.chunkSize = chunkSize;
        this.id = uniqueId('session-');
        this.logger = createLogger(`cutout-client:${this.id}`, { level: logLevel });
        this.#fetch = transport ?? ((request: Request) => fetch(request));
    }

    get closed(): boolean {
        return this.#closed;
    }

    /**
     * send a request, resolving once the response headers arrive
     * @param action a short description of what the request is for, used in errors and logs
     * @throws CutoutHttpError if the server answers with anything other than a 2xx status
     */
    async send(action: string, path: string, init: RequestInit = {}): Promise<Response> {
        if (this.#closed) {
            throw new SessionClosedError(`cannot "${action}": the session to ${this.baseUrl} is closed`);
        }
        const method = init.method ?? 'GET';
        const request = new Request(new URL(path, this.baseUrl), { ...init, signal: this.#controller.signal });
        this.logger.debug(`${method} ${path}`);
        const response = await this.#fetch(request);
        if (!response.ok) {
            const body = parseErrorBody(await response.text());
            const error = new CutoutHttpError({
                action,
                status: response.status,
                statusText: response.statusText,
                method,
                path,
                kind: body.error,
                detail: body.message,
            });
            this.logger.error(error.message);
            throw error;
        }
        return response;
    }

    /**
     * GET a JSON document and validate it against a schema
     * @throws UnexpectedResponseError if the body is not JSON, or does not fit the schema
     */
    async getJson<Schema extends z.ZodTypeAny>(action: string, path: string, schema: Schema): Promise<z.output<Schema>> {
        const response = await this.send(action, path);
        const text = await response.text();
        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (e) {
            throw new UnexpectedResponseError(`"${action}": the response to GET ${path} is not JSON`, { cause: e });
        }
        const result = schema.safeParse(parsed);
        if (!result.success) {
            const message = `"${action}": the response to GET ${path} does not have the expected form`;
            this.logger.error(message);
            throw new UnexpectedResponseError(message, { cause: result.error });
        }
        return result.data;
    }

    /**
     * abort every request still in flight, and refuse new ones. Closing twice does nothing.
     */
    close() {
        if (this.#closed) {
            return;
        }
        this.#closed = true;
        this.#controller.abort(new SessionClosedError(`session to ${this.baseUrl} closed`));
        this.logger.debug('closed');
    }
}

export function openSession(options: SessionOptions): CutoutSession {
    return new CutoutSession(options);
}

/**
 * run the given work with a fresh session, closing the session however the work ends
 */
export async function withSession<T>(options: SessionOptions, work: (session: CutoutSession) => Promise<T>): Promise<T> {
    const session = openSession(options);
    try {
        return await work(session);
    } finally {
        session.close();
    }
}
