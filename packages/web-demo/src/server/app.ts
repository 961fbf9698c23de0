/**
 * TinyRel Web Demo - API routes
 *
 * A small todo tracker backed by TinyRel. Routing is kept apart from the
 * http server so every endpoint can be exercised without a socket.
 *
 * Endpoints:
 *   GET    /api/users            - List users
 *   POST   /api/users            - Create a user (id assigned as max + 1)
 *   GET    /api/todos            - List todos, filtered by ?user_id= or ?completed=
 *   POST   /api/todos            - Create a todo (id assigned as max + 1)
 *   PUT    /api/todos/:id        - Update a todo
 *   DELETE /api/todos/:id        - Delete a todo
 *   GET    /api/join-demo        - users INNER JOIN todos ON users.id = todos.user_id
 *   GET    /api/stats            - Database statistics
 *   POST   /api/sql              - Execute raw SQL
 */

import { Database } from '../../../core/src/storage/Database';
import { QueryExecutor } from '../../../core/src/engine/QueryExecutor';
import { isRecord } from '../../../core/src/storage/MemoryStore';
import { errorMessage, isTinyRelError } from '../../../core/src/errors';
import { Row } from '../../../core/src/storage/Row';

export interface ApiRequest {
    method: string;
    pathname: string;
    query: URLSearchParams;
    body?: unknown;
}

export interface ApiBody {
    success: boolean;
    data?: unknown;
    count?: number;
    message?: string;
    error?: string;
}

export interface ApiResponse {
    status: number;
    body: ApiBody;
}

const SCHEMA_SQL = [
    `CREATE TABLE users (
        id INT PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        email VARCHAR(255) UNIQUE,
        active BOOLEAN
    );`,
    `CREATE TABLE todos (
        id INT PRIMARY KEY,
        user_id INT NOT NULL,
        title VARCHAR(200) NOT NULL,
        completed BOOLEAN,
        created_at VARCHAR(50)
    );`,
];

const SAMPLE_USERS = [
    { id: 1, name: 'Ada Park', email: 'ada@example.com', active: true },
    { id: 2, name: 'Ben Ortiz', email: 'ben@example.com', active: true },
    { id: 3, name: 'Cleo Ruiz', email: 'cleo@example.com', active: false },
];

const SAMPLE_TODOS = [
    { id: 1, user_id: 1, title: 'Sketch the schema', completed: true, created_at: '2024-03-01' },
    { id: 2, user_id: 1, title: 'Wire up the API', completed: false, created_at: '2024-03-02' },
    { id: 3, user_id: 2, title: 'Write the README', completed: false, created_at: '2024-03-02' },
    { id: 4, user_id: 2, title: 'Try a join query', completed: false, created_at: '2024-03-03' },
    { id: 5, user_id: 3, title: 'Review the parser', completed: true, created_at: '2024-02-28' },
];

/**
 * Create the demo tables when missing, and seed them when `users` is empty.
 */
export function initializeDatabase(database: Database): void {
    const executor = new QueryExecutor(database);

    for (const sql of SCHEMA_SQL) {
        const result = executor.execute(sql);
        if (result.success) {
            console.log(`✓ ${result.message}`);
        }
    }

    if (!database.getTable('users').isEmpty()) {
        return;
    }

    for (const user of SAMPLE_USERS) {
        database.insert('users', user);
    }
    for (const todo of SAMPLE_TODOS) {
        database.insert('todos', todo);
    }
    console.log('✓ Sample users and todos inserted');
}

function nextId(database: Database, tableName: string): number {
    return database.selectAll(tableName).reduce((max, row) => {
        const id = row.get('id');
        return typeof id === 'number' && id > max ? id : max;
    }, 0) + 1;
}

function listResponse(rows: Row[], message?: string): ApiResponse {
    const data = rows.map(row => row.toObject());
    return { status: 200, body: { success: true, message, data, count: data.length } };
}

function fail(status: number, error: string): ApiResponse {
    return { status, body: { success: false, error } };
}

function requireObject(body: unknown): Record<string, unknown> | null {
    return isRecord(body) ? body : null;
}

function listTodos(database: Database, query: URLSearchParams): ApiResponse {
    const userId = query.get('user_id');
    if (userId) {
        if (!/^\d+$/.test(userId)) {
            return fail(400, `Invalid user_id: '${userId}'`);
        }
        return listResponse(database.selectByColumn('todos', 'user_id', parseInt(userId, 10)));
    }

    const completed = query.get('completed');
    if (completed !== null) {
        return listResponse(database.selectByColumn('todos', 'completed', completed.toLowerCase() === 'true'));
    }

    return listResponse(database.selectAll('todos'));
}

function createUser(database: Database, body: unknown): ApiResponse {
    const data = requireObject(body);
    if (!data) {
        return fail(400, 'Request body must be a JSON object');
    }

    const user = database.insert('users', {
        id: nextId(database, 'users'),
        name: data.name ?? null,
        email: data.email ?? null,
        active: data.active ?? true,
    });
    return { status: 201, body: { success: true, message: 'User created successfully', data: user.toObject() } };
}

function createTodo(database: Database, body: unknown): ApiResponse {
    const data = requireObject(body);
    if (!data) {
        return fail(400, 'Request body must be a JSON object');
    }

    const todo = database.insert('todos', {
        id: nextId(database, 'todos'),
        user_id: data.user_id ?? null,
        title: data.title ?? null,
        completed: data.completed ?? false,
        created_at: data.created_at ?? new Date().toISOString().slice(0, 10),
    });
    return { status: 201, body: { success: true, message: 'Todo created successfully', data: todo.toObject() } };
}

function updateTodo(database: Database, id: number, body: unknown): ApiResponse {
    const data = requireObject(body);
    if (!data || Object.keys(data).length === 0) {
        return fail(400, 'No fields to update');
    }

    const updated = database.updateWhere('todos', row => row.get('id') === id, data);
    if (updated === 0) {
        return fail(404, 'Todo not found');
    }
    return { status: 200, body: { success: true, message: 'Todo updated successfully', count: updated } };
}

function deleteTodo(database: Database, id: number): ApiResponse {
    const deleted = database.deleteWhere('todos', row => row.get('id') === id);
    if (deleted === 0) {
        return fail(404, 'Todo not found');
    }
    return { status: 200, body: { success: true, message: 'Todo deleted successfully', count: deleted } };
}

function executeSQL(database: Database, body: unknown): ApiResponse {
    const data = requireObject(body);
    if (!data || typeof data.sql !== 'string') {
        return fail(400, 'Missing sql field');
    }

    const result = new QueryExecutor(database).execute(data.sql);
    if (!result.success) {
        return fail(400, result.error);
    }
    return { status: 200, body: { success: true, message: result.message, data: result } };
}

function route(database: Database, request: ApiRequest): ApiResponse {
    const { method, pathname, query, body } = request;

    if (pathname === '/api/users') {
        if (method === 'GET') {
            return listResponse(database.selectAll('users'));
        }
        if (method === 'POST') {
            return createUser(database, body);
        }
    }

    if (pathname === '/api/todos') {
        if (method === 'GET') {
            return listTodos(database, query);
        }
        if (method === 'POST') {
            return createTodo(database, body);
        }
    }

    const todoMatch = pathname.match(/^\/api\/todos\/(\d+)$/);
    if (todoMatch) {
        const id = parseInt(todoMatch[1], 10);
        if (method === 'PUT') {
            return updateTodo(database, id, body);
        }
        if (method === 'DELETE') {
            return deleteTodo(database, id);
        }
    }

    if (pathname === '/api/join-demo' && method === 'GET') {
        const rows = database.joinInner('users', 'todos', 'id', 'user_id');
        return listResponse(rows, `Joined ${rows.length} records`);
    }

    if (pathname === '/api/stats' && method === 'GET') {
        return { status: 200, body: { success: true, data: database.getDatabaseInfo() } };
    }

    if (pathname === '/api/sql' && method === 'POST') {
        return executeSQL(database, body);
    }

    return fail(404, 'Not found');
}

/**
 * Dispatch an API request. Engine errors become 400 responses; anything
 * else is reported as a 500.
 */
export function handleApiRequest(database: Database, request: ApiRequest): ApiResponse {
    try {
        return route(database, request);
    } catch (error) {
        return fail(isTinyRelError(error) ? 400 : 500, errorMessage(error));
    }
}
