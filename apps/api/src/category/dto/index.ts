export * from './category-response.dto';
export * from './category.dto';
export * from './create-category.dto';
