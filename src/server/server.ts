import * as http from 'http';
import { DEFAULT_HOST, DEFAULT_PORT } from '../config';
import { dbg, say } from '../utils';
import { RouteHandler } from './routes';

export interface ServerOptions {
    host?: string;
    port?: number;
}

function readBody(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
        req.on('error', reject);
    });
}

function toHeaders(incoming: http.IncomingHttpHeaders): Headers {
    const headers = new Headers();
    for (const [name, value] of Object.entries(incoming)) {
        if (Array.isArray(value)) {
            value.forEach(v => headers.append(name, v));
        } else if (value !== undefined) {
            headers.set(name, value);
        }
    }
    return headers;
}

async function toRequest(req: http.IncomingMessage, origin: string): Promise<Request> {
    const method = req.method ?? 'GET';
    const body = method === 'GET' || method === 'HEAD' ? undefined : await readBody(req);
    return new Request(new URL(req.url ?? '/', origin), {
        method,
        headers: toHeaders(req.headers),
        body,
    });
}

async function writeResponse(res: http.ServerResponse, response: Response): Promise<void> {
    res.statusCode = response.status;
    response.headers.forEach((value, name) => res.setHeader(name, value));
    res.end(await response.text());
}

/**
 * Serves `handler` over node:http. Resolves once the server is listening.
 */
export function startServer(handler: RouteHandler, options: ServerOptions = {}): Promise<http.Server> {
    const host = options.host ?? DEFAULT_HOST;
    const port = options.port ?? DEFAULT_PORT;
    const origin = `http://${host}:${port}`;

    const server = http.createServer((req, res) => {
        dbg(`${req.method} ${req.url}`);
        toRequest(req, origin)
            .then(handler)
            .then(response => writeResponse(res, response))
            .catch((error: unknown) => {
                console.error("Error handling HTTP request:", error);
                if (!res.headersSent) {
                    res.statusCode = 500;
                }
                res.end();
            });
    });

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            server.on('error', (error: Error) => console.error("HTTP server error:", error));
            say(`Business planner listening on ${origin}`);
            resolve(server);
        });
    });
}
