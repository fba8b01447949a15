/**
 * Assessment statistics
 */

export * from './statistics.types';
export * from './statistics-collector';
export * from './statistics-report';
