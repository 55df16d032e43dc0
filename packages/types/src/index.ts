export * from './enums.js';
export * from './common.schema.js';
export * from './auth.schema.js';
export * from './task.schema.js';
export * from './category.schema.js';
