// Schemas and types
export * from './schemas';
export * from './types';

// Errors
export * from './errors';

// Logger
export * from './logger';

// Config
export * from './config';

// Utils
export * from './utils';

// Vector reduction
export * from './vector';

// Constants
export * from './constants';

// Collaborators
export * from './services';
