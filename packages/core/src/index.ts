// Application exports
export * from './application';

// Domain exports
export * from './domain/entities';
export * from './domain/errors';
export * from './domain/repositories';
