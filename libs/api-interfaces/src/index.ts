export * from './lib/category/category.interface';
export * from './lib/error/error-response.interface';
