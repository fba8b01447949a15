/**
 * Assessment Module Types
 */

import type { AssessmentSettings, Organization, OrganizationOutcome } from '../../lib/assessment';
import type { OrganizationEvaluation } from '../../lib/evaluation';
import type { AssessmentStatistics } from '../../lib/statistics';

export enum AssessmentStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export interface IAssessmentJob {
  id: string;
  status: AssessmentStatus;
  catalog: string;
  settings: AssessmentSettings;
  useLlm: boolean;

  /**
   * Ask the LLM for a summary of every evaluated organization
   */
  summarize: boolean;
  organizations: Organization[];
  outcomes: OrganizationOutcome[];
  statistics: AssessmentStatistics | null;
  progressMessage: string;
  errorMessage?: string;

  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

/**
 * Per-organization outcome without page contents
 */
export interface IOutcomeView {
  organization: Organization;
  totalPages: number;
  successfulPages: number;
  crawlErrors: Array<{ url: string; error: string }>;
  evaluation: OrganizationEvaluation | null;
  summary?: string;
  error?: string;
}

export interface IAssessmentView {
  id: string;
  status: AssessmentStatus;
  catalog: string;
  settings: AssessmentSettings;
  useLlm: boolean;
  summarize: boolean;
  organizations: Organization[];
  completedOrganizations: number;
  outcomes: IOutcomeView[];
  progressMessage: string;
  errorMessage?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface IAssessmentProgressEvent {
  assessmentId: string;
  status: AssessmentStatus;
  message: string;
  completed: number;
  total: number;
}

export interface IAssessmentResponse {
  success: true;
  assessment: IAssessmentView;
}

export interface IAssessmentErrorResponse {
  success: false;
  error: string;
}

export type IAssessmentSocketResponse = IAssessmentResponse | IAssessmentErrorResponse;

export interface IAssessmentListResponse {
  success: true;
  assessments: IAssessmentView[];
  total: number;
}
