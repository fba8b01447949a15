/**
 * Crawling System
 * Main export file for organization crawling
 */

export * from './crawling.types';
export * from './crawl.strategy';
export * from './link-classifier';
export * from './url-title';
export * from './robots';
export * from './sleep';
export * from './strategies';
export * from './crawl-orchestrator';
