/**
 * Batch assessments
 */

export * from './assessment.types';
export * from './assessment-runner';
