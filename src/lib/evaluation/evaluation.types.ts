/**
 * Evaluation Types
 * Type definitions for criteria evaluation
 */

export type CriterionType = 'operational' | 'strategic';

export const CRITERION_TYPES: readonly CriterionType[] = ['operational', 'strategic'];

export type PatternType = 'text' | 'url' | 'logo';

export const PATTERN_TYPES: readonly PatternType[] = ['text', 'url', 'logo'];

/**
 * Tag naming the kind of evidence behind a result
 */
export type EvidenceTag = PatternType | 'llm';

/**
 * Evidence strategy types
 */
export enum EvidenceStrategyType {
  LLM = 'llm',
  PATTERN = 'pattern',
}

export interface CriterionDefinition {
  id: string;
  dimension: string;
  factor: string;
  name: string;
  description: string;
  type: CriterionType;

  /**
   * Pattern type to ordered pattern strings. Unknown types are kept and ignored by the matcher.
   */
  patterns: Record<string, string[]>;
  weight: number;
  confidenceThreshold?: number;
}

/**
 * One piece of evidence found on one page
 */
export interface EvidenceMatch {
  confidence: number;
  patternType: EvidenceTag;
  evidence: string;
  sourceUrl: string;
}

export interface CriterionEvaluation {
  criterionId: string;
  criterionName: string;
  evaluation: boolean;
  confidence: number;
  justification: string;
  sourceUrl: string;
  evidenceText: string;
  patternType: EvidenceTag | '';
}

export interface DimensionSummary {
  total: number;
  fulfilled: number;
  percentage: number;
}

export interface ConfidenceBands {
  /**
   * confidence > 0.8
   */
  high: number;

  /**
   * 0.5 <= confidence <= 0.8
   */
  medium: number;

  /**
   * confidence < 0.5
   */
  low: number;
}

export interface EvaluationSummary {
  byDimension: Record<string, DimensionSummary>;
  byConfidence: ConfidenceBands;
  byPatternType: Partial<Record<EvidenceTag, number>>;
  fulfilledByType: Record<CriterionType, number>;
  totalByType: Record<CriterionType, number>;
}

export interface OrganizationEvaluation {
  organizationName: string;
  baseUrl: string;
  criteriaResults: CriterionEvaluation[];
  totalCriteria: number;
  fulfilledCriteria: number;
  fulfillmentPercentage: number;
  averageConfidence: number;
  summary: EvaluationSummary;
}
