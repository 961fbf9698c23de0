/**
 * TinyRel Web Demo - HTTP Server
 *
 * A minimal HTTP server exposing the todo API from ./app.
 * Uses Node.js built-in http module to avoid external dependencies.
 *
 * Design decisions:
 * - Uses native Node.js http module (no Express/Koa)
 * - RESTful API design, JSON request/response
 * - Optional persistence: set TINYREL_PERSIST to a JSON file path and the
 *   database is restored at start and saved after every successful write
 */

import * as http from 'http';
import { Database } from '../../../core/src/storage/Database';
import { MemoryStore } from '../../../core/src/storage/MemoryStore';
import { loadDatabase, saveDatabase } from '../../../core/src/persistence/DatabasePersistence';
import { errorMessage } from '../../../core/src/errors';
import { ApiBody, handleApiRequest, initializeDatabase } from './app';

export interface ServerOptions {
    database: Database;
    store?: MemoryStore;
}

export class RequestBodyError extends Error {}

// Parse JSON body from request
export function parseBody(req: http.IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
        let body = '';
        req.on('data', (chunk: Buffer) => {
            body += chunk.toString();
        });
        req.on('end', () => {
            if (!body) {
                resolve(undefined);
                return;
            }
            try {
                const parsed: unknown = JSON.parse(body);
                resolve(parsed);
            } catch {
                reject(new RequestBodyError('Invalid JSON'));
            }
        });
        req.on('error', reject);
    });
}

// Send JSON response
function sendJSON(res: http.ServerResponse, data: ApiBody, status: number = 200): void {
    res.writeHead(status, {
        'Content-Type': 'application/json',
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
    });
    res.end(JSON.stringify(data));
}

async function handleRequest(
    options: ServerOptions,
    req: http.IncomingMessage,
    res: http.ServerResponse
): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    console.log(`${method} ${url.pathname}`);

    // CORS preflight
    if (method === 'OPTIONS') {
        sendJSON(res, { success: true });
        return;
    }

    let body: unknown;
    if (method === 'POST' || method === 'PUT') {
        try {
            body = await parseBody(req);
        } catch (error) {
            sendJSON(res, { success: false, error: errorMessage(error) }, 400);
            return;
        }
    }

    const response = handleApiRequest(options.database, {
        method,
        pathname: url.pathname,
        query: url.searchParams,
        body,
    });

    if (options.store && method !== 'GET' && response.body.success) {
        saveDatabase(options.database, options.store);
    }

    sendJSON(res, response.body, response.status);
}

export function createServer(options: ServerOptions): http.Server {
    return http.createServer((req, res) => {
        handleRequest(options, req, res).catch((error: unknown) => {
            console.error('Request error:', error);
            sendJSON(res, { success: false, error: 'Internal Server Error' }, 500);
        });
    });
}

function main(): void {
    const port = parseInt(process.env.PORT ?? '3000', 10);
    const persistFile = process.env.TINYREL_PERSIST;

    const database = new Database('web_demo');
    const store = persistFile ? new MemoryStore(persistFile) : undefined;
    if (store) {
        loadDatabase(database, store);
    }
    initializeDatabase(database);

    const server = createServer({ database, store });
    server.listen(port, () => {
        console.log(`
╔═══════════════════════════════════════════════════════════════╗
║   TinyRel Web Demo                                            ║
║   Server running at http://localhost:${String(port).padEnd(25)}║
║                                                               ║
║   GET    /api/users          POST   /api/users                ║
║   GET    /api/todos          POST   /api/todos                ║
║   PUT    /api/todos/:id      DELETE /api/todos/:id            ║
║   GET    /api/join-demo      GET    /api/stats                ║
║   POST   /api/sql                                             ║
╚═══════════════════════════════════════════════════════════════╝
`);
    });
}

if (require.main === module) {
    main();
}
