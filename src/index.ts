// Core domain
export * from './core-domain';

// Analytics
export * from './analytics';

// Storage
export * from './core-db';
export * from './snapshot-file';

// Services
export * from './core-services';

// Connectors
export * from './connectors';

// Ambient
export { loadConfig, ConfigValidationError, type Config } from './config';
export { logger, type Logger } from './logger';
