export * from './app.exception';
export * from './conflict.exception';
export * from './internal.exception';
export * from './not-found.exception';
export * from './validation.exception';
