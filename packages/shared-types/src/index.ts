// Core entities
export * from './location';
export * from './alerts';

// Enums
export * from './enums';

// Validation schemas
export * from './validation';
