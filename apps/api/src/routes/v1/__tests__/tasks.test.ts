/**
 * Route tests for /api/v1/tasks
 */

import { z } from 'zod';
import {
  ErrorBody,
  IdBody,
  ValidationErrorBody,
  createTestApp,
  makeAuthenticatedRequest,
  readJson,
  registerAndLogin,
} from '../../../test/helpers.js';

const TaskBody = z.object({
  id: z.number(),
  title: z.string(),
  status: z.enum(['pending', 'completed']),
  priority: z.enum(['low', 'medium', 'high']),
  due_date: z.string().nullable(),
  category_id: z.number().nullable(),
  category_name: z.string().nullable(),
  completed_at: z.string().nullable(),
});

const TaskListBody = z.object({
  items: z.array(TaskBody),
  total: z.number(),
  limit: z.number(),
  offset: z.number(),
});

async function setup() {
  const context = createTestApp({ now: () => new Date('2025-03-01T12:00:00Z') });
  const user = await registerAndLogin(context.app);

  const request = (method: string, path: string, body?: unknown) =>
    makeAuthenticatedRequest(context.app, method, `/api/v1/tasks${path}`, user.accessToken, {
      body,
    });

  return { ...context, user, request };
}

describe('POST /api/v1/tasks', () => {
  it('creates a pending task with defaults', async () => {
    const { request, user } = await setup();

    const response = await request('POST', '', { title: '  Write report  ' });

    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({
      id: 1,
      user_id: user.id,
      title: 'Write report',
      description: null,
      priority: 'medium',
      due_date: null,
      category_id: null,
      status: 'pending',
      created_at: '2025-03-01T12:00:00.000Z',
      updated_at: '2025-03-01T12:00:00.000Z',
      completed_at: null,
      category_name: null,
      category_description: null,
    });
  });

  it('reads a due date without an offset as UTC', async () => {
    const { request } = await setup();

    const response = await request('POST', '', {
      title: 'Pay rent',
      due_date: '2025-12-31T23:59:59',
    });

    expect(response.status).toBe(201);
    expect((await readJson(response, TaskBody)).due_date).toBe('2025-12-31T23:59:59.000Z');
  });

  it('returns 422 for a numeric due date', async () => {
    const { request } = await setup();

    const response = await request('POST', '', { title: 'Pay rent', due_date: 1767225599 });

    expect(response.status).toBe(422);
    const body = await readJson(response, ValidationErrorBody);
    expect(body.issues).toEqual([
      {
        path: 'due_date',
        message:
          "due_date must be in ISO 8601 format (e.g. '2025-12-31T23:59:59'), not a Unix timestamp",
      },
    ]);
  });

  it.each(['2025-02-30', '2025-04-31T09:00:00Z', '2025-01-01T24:00:00Z'])(
    'returns 422 for the impossible due date %s',
    async (dueDate) => {
      const { request } = await setup();

      const response = await request('POST', '', { title: 'Pay rent', due_date: dueDate });

      expect(response.status).toBe(422);
      expect((await readJson(response, ValidationErrorBody)).issues).toEqual([
        {
          path: 'due_date',
          message:
            "due_date must be in ISO 8601 format (e.g. '2025-12-31T23:59:59'), not a Unix timestamp",
        },
      ]);
    }
  );

  it('returns 422 for a category id beyond the integer range', async () => {
    const { request } = await setup();

    const response = await request('POST', '', { title: 'Pay rent', category_id: 3000000000 });

    expect(response.status).toBe(422);
    expect((await readJson(response, ValidationErrorBody)).issues).toEqual([
      { path: 'category_id', message: 'category_id is out of range' },
    ]);
  });

  it('returns 422 for an empty title', async () => {
    const { request } = await setup();

    const response = await request('POST', '', { title: '   ' });

    expect(response.status).toBe(422);
    expect((await readJson(response, ValidationErrorBody)).issues[0]?.path).toBe('title');
  });

  it("returns 400 for another user's category", async () => {
    const { app, request } = await setup();
    const other = await registerAndLogin(app);
    const created = await makeAuthenticatedRequest(app, 'POST', '/api/v1/categories', other.accessToken, {
      body: { name: 'Private' },
    });
    const { id: categoryId } = await readJson(created, IdBody);

    const response = await request('POST', '', { title: 'Sneaky', category_id: categoryId });

    expect(response.status).toBe(400);
    expect(await readJson(response, ErrorBody)).toEqual({
      error: 'invalid_category',
      message: `Invalid category: ${categoryId}`,
    });
  });

  it('joins the category name', async () => {
    const { app, request, user } = await setup();
    const created = await makeAuthenticatedRequest(app, 'POST', '/api/v1/categories', user.accessToken, {
      body: { name: 'Work', description: 'Office things' },
    });
    const { id: categoryId } = await readJson(created, IdBody);

    const response = await request('POST', '', { title: 'Standup', category_id: categoryId });

    expect(await response.json()).toMatchObject({
      category_id: categoryId,
      category_name: 'Work',
      category_description: 'Office things',
    });
  });
});

describe('GET /api/v1/tasks', () => {
  it('filters, searches and paginates', async () => {
    const { request } = await setup();
    await request('POST', '', { title: 'Buy milk', priority: 'low' });
    await request('POST', '', { title: 'Buy bread', priority: 'high' });
    await request('POST', '', { title: 'Call mom', priority: 'high' });

    const searched = await readJson(await request('GET', '?search=buy'), TaskListBody);
    expect(searched.items.map((task) => task.title).sort()).toEqual(['Buy bread', 'Buy milk']);
    expect(searched.total).toBe(2);

    const high = await readJson(await request('GET', '?priority=high'), TaskListBody);
    expect(high.total).toBe(2);

    const page = await readJson(
      await request('GET', '?sort_by=priority&order=asc&limit=1&offset=1'),
      TaskListBody
    );
    expect(page).toMatchObject({ total: 3, limit: 1, offset: 1 });
    expect(page.items.map((task) => task.title)).toEqual(['Buy bread']);
  });

  it('returns 422 when limit exceeds 100', async () => {
    const { request } = await setup();

    const response = await request('GET', '?limit=101');

    expect(response.status).toBe(422);
    expect((await readJson(response, ValidationErrorBody)).issues).toEqual([
      { path: 'limit', message: 'limit cannot exceed 100' },
    ]);
  });

  it("never lists another user's tasks", async () => {
    const { app, request } = await setup();
    const other = await registerAndLogin(app);
    await makeAuthenticatedRequest(app, 'POST', '/api/v1/tasks', other.accessToken, {
      body: { title: 'Not yours' },
    });

    const list = await readJson(await request('GET', ''), TaskListBody);

    expect(list).toEqual({ items: [], total: 0, limit: 20, offset: 0 });
  });
});

describe('task by id', () => {
  it("returns 404 for another user's task on every verb", async () => {
    const { app, request } = await setup();
    const other = await registerAndLogin(app);
    const created = await makeAuthenticatedRequest(app, 'POST', '/api/v1/tasks', other.accessToken, {
      body: { title: 'Not yours' },
    });
    const { id } = await readJson(created, IdBody);

    const responses = [
      await request('GET', `/${id}`),
      await request('PATCH', `/${id}`, { title: 'Mine now' }),
      await request('PATCH', `/${id}/status`, { status: 'completed' }),
      await request('DELETE', `/${id}`),
    ];

    for (const response of responses) {
      expect(response.status).toBe(404);
      expect(await readJson(response, ErrorBody)).toEqual({
        error: 'not_found',
        message: `Task not found: ${id}`,
      });
    }
  });

  it.each(['abc', '0x10', '1e1', '%205%20', '3000000000'])(
    'returns 422 for the id %s',
    async (id) => {
      const { request } = await setup();
      await request('POST', '', { title: 'Existing' });

      const response = await request('GET', `/${id}`);

      expect(response.status).toBe(422);
      expect((await readJson(response, ValidationErrorBody)).issues[0]?.path).toBe('id');
    }
  );

  it('returns 422 for a category filter that is not plain digits', async () => {
    const { request } = await setup();

    const response = await request('GET', '?category_id=1e1');

    expect(response.status).toBe(422);
    expect((await readJson(response, ValidationErrorBody)).issues).toEqual([
      { path: 'category_id', message: 'category_id must be a positive integer' },
    ]);
  });

  it('applies a partial update and clears fields set to null', async () => {
    const { request } = await setup();
    await request('POST', '', {
      title: 'Draft',
      description: 'First pass',
      due_date: '2025-04-01T09:00:00Z',
    });

    const response = await request('PATCH', '/1', { priority: 'high', due_date: null });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      title: 'Draft',
      description: 'First pass',
      priority: 'high',
      due_date: null,
    });
  });

  it('stamps completed_at on completion and clears it on reopen', async () => {
    const { request } = await setup();
    await request('POST', '', { title: 'Ship it' });

    const completed = await readJson(
      await request('PATCH', '/1/status', { status: 'completed' }),
      TaskBody
    );
    expect(completed.status).toBe('completed');
    expect(completed.completed_at).toBe('2025-03-01T12:00:00.000Z');

    const reopened = await readJson(await request('PATCH', '/1/status', { status: 'pending' }), TaskBody);
    expect(reopened.status).toBe('pending');
    expect(reopened.completed_at).toBeNull();
  });

  it('deletes with 204 and then returns 404', async () => {
    const { request } = await setup();
    await request('POST', '', { title: 'Temporary' });

    const deleted = await request('DELETE', '/1');
    expect(deleted.status).toBe(204);
    expect(await deleted.text()).toBe('');

    expect((await request('GET', '/1')).status).toBe(404);
  });
});

describe('GET /api/v1/tasks/stats', () => {
  it('reports zero completion for a user without tasks', async () => {
    const { request } = await setup();

    const response = await request('GET', '/stats');

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ total: 0, completed: 0, pending: 0, completion_rate: 0 });
  });

  it('rounds the completion rate to two decimals', async () => {
    const { request } = await setup();
    await request('POST', '', { title: 'One' });
    await request('POST', '', { title: 'Two' });
    await request('POST', '', { title: 'Three' });
    await request('PATCH', '/1/status', { status: 'completed' });

    const response = await request('GET', '/stats');

    expect(await response.json()).toEqual({
      total: 3,
      completed: 1,
      pending: 2,
      completion_rate: 33.33,
    });
  });
});
