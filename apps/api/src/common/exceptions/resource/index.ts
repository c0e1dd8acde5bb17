export * from './category-already-exists.exception';
export * from './category-not-found.exception';
