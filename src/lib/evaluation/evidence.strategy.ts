/**
 * Evidence Strategy
 * Base interface and abstract class for evidence strategies
 */

import type { PageResult } from '../fetching';
import { CriterionDefinition, EvidenceMatch, EvidenceStrategyType, EvidenceTag } from './evaluation.types';

/**
 * Evidence strategy interface
 */
export interface IEvidenceStrategy {
  name: string;
  type: EvidenceStrategyType;

  /**
   * Best evidence for the criterion on one page, or null
   */
  evaluate(criterion: CriterionDefinition, page: PageResult, signal?: AbortSignal): Promise<EvidenceMatch | null>;

  /**
   * Check if strategy is available/configured
   */
  isAvailable(): boolean;
}

/**
 * Base evidence strategy class
 */
export abstract class BaseEvidenceStrategy implements IEvidenceStrategy {
  abstract name: string;
  abstract type: EvidenceStrategyType;

  abstract evaluate(
    criterion: CriterionDefinition,
    page: PageResult,
    signal?: AbortSignal
  ): Promise<EvidenceMatch | null>;

  abstract isAvailable(): boolean;

  /**
   * Create a match with confidence clamped to [0, 1]
   */
  protected createMatch(
    confidence: number,
    patternType: EvidenceTag,
    evidence: string,
    sourceUrl: string
  ): EvidenceMatch {
    return {
      confidence: clampConfidence(confidence),
      patternType,
      evidence,
      sourceUrl,
    };
  }
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
