import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { MockServerEngine } from './engine';

export type RunningServer = {
    readonly url: string;
    readonly server: Server;
    close(): Promise<void>;
};

export type ServeOptions = {
    host?: string | undefined;
    // 0 picks a free port
    port?: number | undefined;
};

/**
 * @returns a web Request with the same method, url, headers and (streamed) body as an incoming node request
 */
export function toWebRequest(req: IncomingMessage, origin: string): Request {
    const headers = new Headers();
    for (const [name, value] of Object.entries(req.headers)) {
        if (Array.isArray(value)) {
            value.forEach((v) => headers.append(name, v));
        } else if (value !== undefined) {
            headers.set(name, value);
        }
    }
    const method = req.method ?? 'GET';
    const hasBody = method !== 'GET' && method !== 'HEAD';
    return new Request(new URL(req.url ?? '/', origin), {
        method,
        headers,
        body: hasBody ? Readable.toWeb(req) : null,
        duplex: 'half',
    });
}

async function writeWebResponse(response: Response, res: ServerResponse) {
    res.statusCode = response.status;
    response.headers.forEach((value, name) => {
        res.setHeader(name, value);
    });
    if (response.body === null) {
        res.end();
        return;
    }
    await pipeline(Readable.fromWeb(response.body), res);
}

/**
 * put an engine behind a node http server
 * @returns once the server is listening
 */
export function serve(engine: MockServerEngine, options: ServeOptions = {}): Promise<RunningServer> {
    const host = options.host ?? engine.options.host;
    const port = options.port ?? engine.options.port;
    const { logger } = engine;
    const server = createServer((req, res) => {
        const origin = `http://${req.headers.host ?? `${host}:${port}`}`;
        engine
            .handle(toWebRequest(req, origin))
            .then((response) => writeWebResponse(response, res))
            .then(() => {
                // an error response may leave part of the request body unread
                if (!req.complete) {
                    req.destroy();
                }
            })
            .catch((e: unknown) => {
                logger.error(`failed to send a response: ${e instanceof Error ? e.message : String(e)}`);
                res.destroy(e instanceof Error ? e : undefined);
            });
    });
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            const address = server.address();
            const bound = typeof address === 'object' && address !== null ? address.port : port;
            const url = `http://${host}:${bound}`;
            logger.info(`listening on ${url}`);
            resolve({
                url,
                server,
                close: () =>
                    new Promise<void>((done, fail) => {
                        server.close((err) => (err ? fail(err) : done()));
                    }),
            });
        });
    });
}
