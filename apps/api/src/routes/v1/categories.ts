import { CreateCategorySchema, IdParamSchema, UpdateCategorySchema } from '@taskhub/types';
import { Hono } from 'hono';
import { toCategoryResponse } from '../../lib/presenters.js';
import { validate } from '../../lib/validation.js';
import { requireAuth } from '../../middleware/auth.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';

/**
 * Category CRUD. Deleting a category leaves its tasks uncategorized.
 */
export function createCategoryRoutes(
  services: Pick<AppServices, 'categoryService' | 'sessionService'>
) {
  const { categoryService } = services;
  const categoryRoutes = new Hono<AppBindings>();

  categoryRoutes.use('*', requireAuth(services.sessionService));

  categoryRoutes.post('/', validate('json', CreateCategorySchema), async (c) => {
    const body = c.req.valid('json');
    const category = await categoryService.createCategory(c.get('user'), {
      name: body.name,
      description: body.description,
    });
    return c.json(toCategoryResponse(category), 201);
  });

  categoryRoutes.get('/', async (c) => {
    const categories = await categoryService.listCategories(c.get('user'));
    return c.json(categories.map(toCategoryResponse));
  });

  categoryRoutes.get('/:id', validate('param', IdParamSchema), async (c) => {
    const { id } = c.req.valid('param');
    const category = await categoryService.getCategory(c.get('user'), id);
    return c.json(toCategoryResponse(category));
  });

  categoryRoutes.put(
    '/:id',
    validate('param', IdParamSchema),
    validate('json', UpdateCategorySchema),
    async (c) => {
      const { id } = c.req.valid('param');
      const body = c.req.valid('json');

      const category = await categoryService.updateCategory(c.get('user'), id, {
        name: body.name,
        description: body.description,
      });
      return c.json(toCategoryResponse(category));
    }
  );

  categoryRoutes.delete('/:id', validate('param', IdParamSchema), async (c) => {
    const { id } = c.req.valid('param');
    await categoryService.deleteCategory(c.get('user'), id);
    return c.body(null, 204);
  });

  return categoryRoutes;
}
