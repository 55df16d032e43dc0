import { z } from 'zod';

const nameField = z
  .string()
  .trim()
  .min(3, 'Category name must be at least 3 characters')
  .max(100, 'Category name must be 100 characters or less');

export const CreateCategorySchema = z.object({
  name: nameField,
  description: z.string().nullish(),
});

export type CreateCategoryInput = z.infer<typeof CreateCategorySchema>;

export const UpdateCategorySchema = z.object({
  name: nameField.optional(),
  description: z.string().nullable().optional(),
});

export type UpdateCategoryInput = z.infer<typeof UpdateCategorySchema>;
