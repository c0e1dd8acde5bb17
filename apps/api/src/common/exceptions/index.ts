// Base exception classes
export * from './base';

// Domain-specific exceptions
export * from './resource';

// Error codes
export * from './error-codes.enum';
