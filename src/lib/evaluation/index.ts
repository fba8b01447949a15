/**
 * Evaluation Module
 */

export * from './evaluation.types';
export * from './evidence.strategy';
export * from './evaluation-summary';
export * from './criteria-evaluator';
export * from './strategies';
