import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { createTestDb, getRawDb, type TaskDb } from '@taskapi/core';
import { createApp } from '../src/app.js';
import { createLogger } from '../src/log.js';
import { startServer, stopServer } from '../src/server.js';
import type { TaskResponse } from '../src/serializers.js';

// Each test gets a fresh in-memory database and an app bound to a free
// loopback port inside this process.

let db: TaskDb;
let server: Server;
let base: string;

const OLD_STAMP = '2000-01-01T00:00:00.000Z';

const sample = {
  title: 'Buy groceries',
  description: 'Milk, eggs, and bread',
  status: 'pending',
  priority: 'high',
  category: 'personal',
  due_date: '2026-01-25',
};

function send(method: string, path: string, body?: unknown): Promise<Response> {
  return fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? {} : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function create(overrides: Record<string, unknown> = {}): Promise<TaskResponse> {
  const res = await send('POST', '/api/tasks', { ...sample, ...overrides });
  expect(res.status).toBe(201);
  return (await res.json()) as TaskResponse;
}

function age(id: number): void {
  getRawDb(db).prepare('UPDATE tasks SET created_at = ?, updated_at = ? WHERE id = ?').run(OLD_STAMP, OLD_STAMP, id);
}

beforeEach(async () => {
  db = createTestDb();
  server = await startServer(createApp({ db, logger: createLogger('silent') }), { host: '127.0.0.1', port: 0 });
  const { port } = server.address() as AddressInfo;
  base = `http://127.0.0.1:${port}`;
});

afterEach(async () => {
  await stopServer(server);
  getRawDb(db).close();
});

describe('GET /', () => {
  it('reports the service status', async () => {
    const res = await send('GET', '/');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'Task Management API', status: 'running' });
  });
});

describe('POST /api/tasks', () => {
  it('creates a task with an id and equal timestamps', async () => {
    const task = await create();
    expect(task).toMatchObject({ id: 1, ...sample });
    expect(task.created_at).toBe(task.updated_at);
  });

  it('accepts a task without description', async () => {
    const { description: _omitted, ...rest } = sample;
    const res = await send('POST', '/api/tasks', rest);
    expect(res.status).toBe(201);
    expect(((await res.json()) as TaskResponse).description).toBeNull();
  });

  it('rejects a missing title with its field path', async () => {
    const { title: _omitted, ...rest } = sample;
    const res = await send('POST', '/api/tasks', rest);
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ['body', 'title'], msg: 'Required', type: 'invalid_type' }],
    });
  });

  it('rejects an unknown status', async () => {
    const res = await send('POST', '/api/tasks', { ...sample, status: 'invalid_status' });
    expect(res.status).toBe(422);
    const body = (await res.json()) as { detail: Array<{ loc: string[] }> };
    expect(body.detail.map(d => d.loc)).toEqual([['body', 'status']]);
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${base}/api/tasks`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"title": ',
    });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ['body'], msg: 'Invalid JSON', type: 'json_invalid' }],
    });
  });

  it('accepts a title of 150 emoji', async () => {
    const title = '\u{1F600}'.repeat(150);
    expect((await create({ title })).title).toBe(title);
  });

  it('rejects a title containing NUL with a field error', async () => {
    const res = await send('POST', '/api/tasks', { ...sample, title: '\u0000abc' });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ['body', 'title'], msg: 'Must not contain NUL characters', type: 'custom' }],
    });
  });

  it('never stores an invalid payload', async () => {
    await send('POST', '/api/tasks', { ...sample, due_date: '2026-02-30' });
    const res = await send('GET', '/api/tasks');
    expect(await res.json()).toEqual([]);
  });

  it.each(['pending', 'in_progress', 'completed'])('accepts status %s', async (status) => {
    expect((await create({ status })).status).toBe(status);
  });

  it.each(['low', 'medium', 'high'])('accepts priority %s', async (priority) => {
    expect((await create({ priority })).priority).toBe(priority);
  });
});

describe('GET /api/tasks/:id', () => {
  it('returns the task', async () => {
    const created = await create();
    const res = await send('GET', `/api/tasks/${created.id}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(created);
  });

  it('answers 404 for a missing task', async () => {
    const res = await send('GET', '/api/tasks/99999');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Task not found' });
  });

  it('answers 422 for a non-numeric id', async () => {
    const res = await send('GET', '/api/tasks/abc');
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ['path', 'task_id'], msg: 'Expected an integer', type: 'invalid_string' }],
    });
  });

  it.each(['0', '-3'])('answers 404 for id %s on every verb', async (id) => {
    await create();
    const calls: Array<[string, unknown]> = [['GET', undefined], ['PUT', sample], ['PATCH', {}], ['DELETE', undefined]];
    for (const [method, body] of calls) {
      const res = await send(method, `/api/tasks/${id}`, body);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: 'Task not found' });
    }
  });
});

describe('GET /api/tasks', () => {
  beforeEach(async () => {
    await create({ title: 'a', status: 'pending', priority: 'high', category: 'work', due_date: '2026-03-10' });
    await create({ title: 'b', status: 'completed', priority: 'high', category: 'work', due_date: '2026-03-01' });
    await create({ title: 'c', status: 'pending', priority: 'low', category: 'home', due_date: '2026-02-15' });
    await create({ title: 'd', status: 'pending', priority: 'high', category: 'home', due_date: '2026-02-20' });
  });

  async function titles(query: string): Promise<string[]> {
    const res = await send('GET', `/api/tasks${query}`);
    expect(res.status).toBe(200);
    return ((await res.json()) as TaskResponse[]).map(t => t.title);
  }

  it('lists every task by id', async () => {
    expect(await titles('')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('filters by category', async () => {
    expect(await titles('?category=work')).toEqual(['a', 'b']);
  });

  it('returns exactly the subset matching status and priority', async () => {
    expect(await titles('?status=pending&priority=high')).toEqual(['a', 'd']);
  });

  it('sorts the subset by due date ascending', async () => {
    const res = await send('GET', '/api/tasks?status=pending&priority=high&sort_by=due_date&order=asc');
    const body = (await res.json()) as TaskResponse[];
    expect(body.map(t => t.due_date)).toEqual(['2026-02-20', '2026-03-10']);
  });

  it('defaults to ascending order when sorting', async () => {
    expect(await titles('?sort_by=due_date')).toEqual(['c', 'd', 'b', 'a']);
  });

  it('sorts descending', async () => {
    expect(await titles('?sort_by=due_date&order=desc')).toEqual(['a', 'b', 'd', 'c']);
  });

  it('returns an empty list when nothing matches', async () => {
    expect(await titles('?category=garden')).toEqual([]);
  });

  it('ignores an empty category filter', async () => {
    expect(await titles('?category=')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('rejects an unknown sort key', async () => {
    const res = await send('GET', '/api/tasks?sort_by=title');
    expect(res.status).toBe(422);
    const body = (await res.json()) as { detail: Array<{ loc: string[] }> };
    expect(body.detail.map(d => d.loc)).toEqual([['query', 'sort_by']]);
  });

  it('rejects an unknown filter value', async () => {
    const res = await send('GET', '/api/tasks?priority=urgent');
    expect(res.status).toBe(422);
  });

  it('rejects an unknown parameter', async () => {
    const res = await send('GET', '/api/tasks?colour=red');
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ['query', 'colour'], msg: "Unknown field 'colour'", type: 'unrecognized_keys' }],
    });
  });
});

describe('PATCH /api/tasks/:id', () => {
  it('changes only status and updated_at', async () => {
    const created = await create();
    age(created.id);

    const res = await send('PATCH', `/api/tasks/${created.id}`, { status: 'completed' });
    expect(res.status).toBe(200);
    const patched = (await res.json()) as TaskResponse;

    expect(patched).toEqual({
      ...created,
      status: 'completed',
      created_at: OLD_STAMP,
      updated_at: patched.updated_at,
    });
    expect(patched.updated_at).not.toBe(OLD_STAMP);
  });

  it('updates several fields at once', async () => {
    const created = await create();
    const res = await send('PATCH', `/api/tasks/${created.id}`, { title: 'Updated Title', priority: 'low' });
    expect(await res.json()).toMatchObject({ title: 'Updated Title', priority: 'low', category: 'personal' });
  });

  it('treats an empty body as a touch', async () => {
    const created = await create();
    age(created.id);

    const res = await send('PATCH', `/api/tasks/${created.id}`, {});
    expect(res.status).toBe(200);
    const patched = (await res.json()) as TaskResponse;
    expect(patched.title).toBe(created.title);
    expect(patched.updated_at).not.toBe(OLD_STAMP);
  });

  it('rejects a NUL title with a field error and keeps the task', async () => {
    const created = await create();
    const res = await send('PATCH', `/api/tasks/${created.id}`, { title: '\u0000' });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ['body', 'title'], msg: 'Must not contain NUL characters', type: 'custom' }],
    });

    const after = await send('GET', `/api/tasks/${created.id}`);
    expect(await after.json()).toEqual(created);
  });

  it('answers 404 for a missing task', async () => {
    const res = await send('PATCH', '/api/tasks/99999', { status: 'completed' });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Task not found' });
  });

  it('answers 422 for an invalid field and leaves the task alone', async () => {
    const created = await create();
    const res = await send('PATCH', `/api/tasks/${created.id}`, { title: 'ok', priority: 'urgent' });
    expect(res.status).toBe(422);

    const after = await send('GET', `/api/tasks/${created.id}`);
    expect(await after.json()).toEqual(created);
  });
});

describe('PUT /api/tasks/:id', () => {
  it('replaces every field', async () => {
    const created = await create();
    const replacement = {
      title: 'Updated Title',
      status: 'in_progress',
      priority: 'medium',
      category: 'work',
      due_date: '2026-02-15',
    };

    const res = await send('PUT', `/api/tasks/${created.id}`, replacement);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      id: created.id,
      ...replacement,
      description: null,
      created_at: created.created_at,
    });
  });

  it('answers 422 when a required field is missing and keeps the stored row', async () => {
    const created = await create();
    const res = await send('PUT', `/api/tasks/${created.id}`, { title: 'UPDATED TITLE' });
    expect(res.status).toBe(422);

    const body = (await res.json()) as { detail: Array<{ loc: string[] }> };
    expect(body.detail.map(d => d.loc)).toEqual([
      ['body', 'status'],
      ['body', 'priority'],
      ['body', 'category'],
      ['body', 'due_date'],
    ]);

    const after = await send('GET', `/api/tasks/${created.id}`);
    expect(await after.json()).toEqual(created);
  });

  it('answers 404 for a missing task', async () => {
    const res = await send('PUT', '/api/tasks/99999', sample);
    expect(res.status).toBe(404);
  });
});

describe('DELETE /api/tasks/:id', () => {
  it('deletes the task, then GET answers 404', async () => {
    const created = await create();

    const res = await send('DELETE', `/api/tasks/${created.id}`);
    expect(res.status).toBe(204);
    expect(await res.text()).toBe('');

    expect((await send('GET', `/api/tasks/${created.id}`)).status).toBe(404);
  });

  it('answers 404 the second time', async () => {
    const created = await create();
    await send('DELETE', `/api/tasks/${created.id}`);
    const res = await send('DELETE', `/api/tasks/${created.id}`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Task not found' });
  });
});

describe('unmatched routes and failures', () => {
  it('answers 404 for unknown paths', async () => {
    const res = await send('GET', '/api/projects');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Not Found' });
  });

  it('hides storage failures behind a generic 500', async () => {
    getRawDb(db).exec('DROP TABLE tasks');
    const res = await send('GET', '/api/tasks');
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: 'Internal Server Error' });
  });
});
