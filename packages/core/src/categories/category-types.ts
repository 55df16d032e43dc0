export interface Category {
  id: number;
  userId: number;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CategoryWithCount extends Category {
  tasksCount: number;
}

export interface CreateCategoryParams {
  name: string;
  description?: string | null;
}

export interface UpdateCategoryParams {
  name?: string;
  description?: string | null;
}

export interface CreateCategoryData {
  userId: number;
  name: string;
  description: string | null;
}

export type UpdateCategoryData = Partial<Pick<Category, 'name' | 'description'>>;
