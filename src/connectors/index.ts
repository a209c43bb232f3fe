/**
 * Connectors Export
 */

export * from './interfaces';
export * from './github-rest.client';
export * from './google-books.client';
export * from './ai-text-generator';
