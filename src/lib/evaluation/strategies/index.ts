/**
 * Evidence Strategies
 */

export { PatternMatcher } from './pattern-matcher';
export type { PatternMatcherOptions } from './pattern-matcher';
export { PatternEvidenceStrategy } from './pattern.strategy';
export { LLMCriterionAnalyzer } from './llm.strategy';
