/**
 * Task CRUD, status changes and per-user statistics
 */

import {
  CreateTaskSchema,
  IdParamSchema,
  ListTasksQuerySchema,
  UpdateTaskSchema,
  UpdateTaskStatusSchema,
} from '@taskhub/types';
import { Hono } from 'hono';
import { toTaskListResponse, toTaskResponse, toTaskStatsResponse } from '../../lib/presenters.js';
import { validate } from '../../lib/validation.js';
import { requireAuth } from '../../middleware/auth.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';

export function createTaskRoutes(services: Pick<AppServices, 'taskService' | 'sessionService'>) {
  const { taskService } = services;
  const taskRoutes = new Hono<AppBindings>();

  taskRoutes.use('*', requireAuth(services.sessionService));

  taskRoutes.post('/', validate('json', CreateTaskSchema), async (c) => {
    const body = c.req.valid('json');

    const task = await taskService.createTask(c.get('user'), {
      title: body.title,
      description: body.description,
      categoryId: body.category_id,
      priority: body.priority,
      dueDate: body.due_date,
    });

    return c.json(toTaskResponse(task), 201);
  });

  taskRoutes.get('/', validate('query', ListTasksQuerySchema), async (c) => {
    const query = c.req.valid('query');

    const result = await taskService.listTasks(c.get('user'), {
      status: query.status,
      priority: query.priority,
      categoryId: query.category_id,
      search: query.search,
      sortBy: query.sort_by,
      order: query.order,
      limit: query.limit,
      offset: query.offset,
    });

    return c.json(toTaskListResponse(result));
  });

  // Registered before /:id so "stats" is not parsed as an id
  taskRoutes.get('/stats', async (c) => {
    const stats = await taskService.getStats(c.get('user'));
    return c.json(toTaskStatsResponse(stats));
  });

  taskRoutes.get('/:id', validate('param', IdParamSchema), async (c) => {
    const { id } = c.req.valid('param');
    const task = await taskService.getTask(c.get('user'), id);
    return c.json(toTaskResponse(task));
  });

  taskRoutes.patch(
    '/:id',
    validate('param', IdParamSchema),
    validate('json', UpdateTaskSchema),
    async (c) => {
      const { id } = c.req.valid('param');
      const body = c.req.valid('json');

      const task = await taskService.updateTask(c.get('user'), id, {
        title: body.title,
        description: body.description,
        categoryId: body.category_id,
        priority: body.priority,
        dueDate: body.due_date,
      });

      return c.json(toTaskResponse(task));
    }
  );

  taskRoutes.patch(
    '/:id/status',
    validate('param', IdParamSchema),
    validate('json', UpdateTaskStatusSchema),
    async (c) => {
      const { id } = c.req.valid('param');
      const { status } = c.req.valid('json');

      const task = await taskService.setTaskStatus(c.get('user'), id, status);
      return c.json(toTaskResponse(task));
    }
  );

  taskRoutes.delete('/:id', validate('param', IdParamSchema), async (c) => {
    const { id } = c.req.valid('param');
    await taskService.deleteTask(c.get('user'), id);
    return c.body(null, 204);
  });

  return taskRoutes;
}
