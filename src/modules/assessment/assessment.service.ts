/**
 * Assessment Service
 * Job orchestration for batch assessments: catalog loading, background runs,
 * progress over Socket.IO, results and statistics export
 */

import { emitToRoom } from '../../lib/socket';
import { createAssessmentRunner, defaultAssessmentSettings } from '../../lib/assessment';
import type { AssessmentRunner, AssessmentSettings, CreateAssessmentRunnerOptions, Organization } from '../../lib/assessment';
import { CatalogLoader, flattenCatalog } from '../../lib/catalog';
import { CatalogError, CrawlerError, errorMessage } from '../../lib/errors';
import type { CriterionDefinition } from '../../lib/evaluation';
import { parseOrganizations, resultsToCsv } from '../../lib/export/csv';
import { createLLMClientFromEnv } from '../../lib/llm';
import type { LLMClient, OrganizationSummarizer } from '../../lib/llm';
import { exportStatisticsReport, StatisticsCollector } from '../../lib/statistics';
import type { AssessmentStatistics, ReportFormat } from '../../lib/statistics';
import { ApiError } from '../../middleware/error-handler';
import { assessmentRepository, AssessmentRepository } from './assessment.repository';
import type { CreateAssessmentRequest } from './assessment.schemas';
import {
  AssessmentStatus,
  IAssessmentJob,
  IAssessmentProgressEvent,
  IAssessmentView,
} from './assessment.types';

export const PROGRESS_EVENT = 'assessment:progress';

export const assessmentRoom = (assessmentId: string): string => `assessment:${assessmentId}`;

export interface AssessmentServiceDeps {
  repository: AssessmentRepository;
  catalogLoader: CatalogLoader;
  statistics: StatisticsCollector;
  createRunner: (criteria: readonly CriterionDefinition[], options: CreateAssessmentRunnerOptions) => AssessmentRunner;
  createLLMClient: () => (LLMClient & OrganizationSummarizer) | null;
  emit: (event: IAssessmentProgressEvent) => void;
}

/**
 * Broadcast a progress event to the assessment room
 */
export const emitToSocket = (event: IAssessmentProgressEvent): void => {
  try {
    emitToRoom(assessmentRoom(event.assessmentId), PROGRESS_EVENT, event);
  } catch (error) {
    console.error('Error emitting progress:', error);
  }
};

const TERMINAL_STATUSES = [AssessmentStatus.COMPLETED, AssessmentStatus.FAILED, AssessmentStatus.CANCELLED];

export class AssessmentService {
  private readonly deps: AssessmentServiceDeps;
  private readonly controllers = new Map<string, AbortController>();

  constructor(deps: Partial<AssessmentServiceDeps> = {}) {
    this.deps = {
      repository: deps.repository ?? assessmentRepository,
      catalogLoader: deps.catalogLoader ?? new CatalogLoader(),
      statistics: deps.statistics ?? new StatisticsCollector(),
      createRunner: deps.createRunner ?? createAssessmentRunner,
      createLLMClient: deps.createLLMClient ?? createLLMClientFromEnv,
      emit: deps.emit ?? emitToSocket,
    };
  }

  /**
   * Create a new assessment job and start it in the background
   */
  async createJob(request: CreateAssessmentRequest): Promise<IAssessmentJob> {
    const organizations = this.resolveOrganizations(request);
    const criteria = await this.loadCriteria(request.catalog);

    const { useLlm = true, summarize = false, ...overrides } = request.settings;
    const settings: AssessmentSettings = { ...defaultAssessmentSettings(), ...overrides };

    const job = await this.deps.repository.create({
      status: AssessmentStatus.QUEUED,
      catalog: request.catalog,
      settings,
      useLlm,
      summarize: useLlm && summarize,
      organizations,
    });

    this.emitProgress(job, 'Assessment created and queued');

    this.executeJob(job.id, criteria).catch((error) => {
      console.error(`Error executing assessment ${job.id}:`, error);
    });

    return job;
  }

  async getJob(id: string): Promise<IAssessmentJob> {
    const job = await this.deps.repository.findById(id);
    if (!job) {
      throw new ApiError(404, 'Assessment not found');
    }
    return job;
  }

  async getJobs(status?: AssessmentStatus): Promise<IAssessmentJob[]> {
    return this.deps.repository.findAll({ status });
  }

  /**
   * Cancel a queued or running job; finished jobs are returned unchanged
   */
  async cancelJob(id: string): Promise<IAssessmentJob> {
    const job = await this.getJob(id);
    if (TERMINAL_STATUSES.includes(job.status)) {
      return job;
    }

    this.controllers.get(id)?.abort();
    const cancelled = (await this.deps.repository.updateStatus(id, AssessmentStatus.CANCELLED)) ?? job;
    this.emitProgress(cancelled, 'Assessment cancelled');
    return cancelled;
  }

  async getResultsCsv(id: string): Promise<string> {
    const job = await this.getJob(id);
    return resultsToCsv(job.outcomes.flatMap((outcome) => (outcome.evaluation ? [outcome.evaluation] : [])));
  }

  /**
   * Statistics of a finished job, or of the outcomes so far
   */
  async getStatistics(id: string): Promise<AssessmentStatistics> {
    const job = await this.getJob(id);
    return job.statistics ?? this.deps.statistics.collect(job.outcomes, job.catalog);
  }

  async getStatisticsReport(id: string, format: ReportFormat): Promise<string> {
    return exportStatisticsReport(await this.getStatistics(id), format);
  }

  private resolveOrganizations(request: CreateAssessmentRequest): Organization[] {
    let organizations: Organization[];
    try {
      organizations = request.organizations ?? parseOrganizations(request.organizationsCsv ?? '');
    } catch (error) {
      if (error instanceof CrawlerError) {
        throw new ApiError(400, error.message);
      }
      throw error;
    }

    if (organizations.length === 0) {
      throw new ApiError(400, 'At least one organization is required');
    }
    return organizations;
  }

  private async loadCriteria(catalog: string): Promise<CriterionDefinition[]> {
    const available = await this.deps.catalogLoader.listCatalogs();
    if (!available.includes(catalog)) {
      throw new ApiError(404, `Catalog '${catalog}' not found`);
    }

    try {
      return flattenCatalog(await this.deps.catalogLoader.loadCatalog(catalog));
    } catch (error) {
      if (error instanceof CatalogError) {
        throw new ApiError(400, error.message);
      }
      throw error;
    }
  }

  private async executeJob(jobId: string, criteria: readonly CriterionDefinition[]): Promise<void> {
    const controller = new AbortController();
    this.controllers.set(jobId, controller);

    try {
      const job = await this.deps.repository.findById(jobId);
      if (!job) {
        throw new Error('Assessment not found');
      }
      if (job.status !== AssessmentStatus.QUEUED) {
        return;
      }

      await this.deps.repository.updateStatus(jobId, AssessmentStatus.RUNNING);
      this.emitProgress(job, `Assessing ${job.organizations.length} organization(s) with catalog '${job.catalog}'`);
      console.log(`Assessment ${jobId}: started with ${criteria.length} criteria`);

      const llmClient = job.useLlm ? this.deps.createLLMClient() : null;
      const runner = this.deps.createRunner(criteria, {
        settings: job.settings,
        llmClient,
        summarizer: job.summarize ? llmClient : null,
      });

      const result = await runner.run(job.organizations, {
        signal: controller.signal,
        onProgress: (message) => this.emitProgress(job, message),
        onOutcome: (outcome) => {
          job.outcomes.push(outcome);
        },
      });

      const statistics = this.deps.statistics.collect(result.outcomes, job.catalog);
      const cancelled = result.cancelled || controller.signal.aborted;
      const status = cancelled ? AssessmentStatus.CANCELLED : AssessmentStatus.COMPLETED;
      const finished = await this.deps.repository.updateStatus(jobId, status, { outcomes: result.outcomes, statistics });

      console.log(`Assessment ${jobId}: ${status} after ${result.durationMs} ms`);
      this.emitProgress(finished ?? job, cancelled ? 'Assessment cancelled' : 'Assessment completed');
    } catch (error) {
      console.error(`Assessment ${jobId}: failed:`, error);
      const failed = await this.deps.repository.updateStatus(jobId, AssessmentStatus.FAILED, {
        errorMessage: errorMessage(error),
      });
      if (failed) {
        this.emitProgress(failed, `Assessment failed: ${errorMessage(error)}`);
      }
    } finally {
      this.controllers.delete(jobId);
    }
  }

  private emitProgress(job: IAssessmentJob, message: string): void {
    job.progressMessage = message;
    this.deps.emit({
      assessmentId: job.id,
      status: job.status,
      message,
      completed: job.outcomes.length,
      total: job.organizations.length,
    });
  }
}

/**
 * API representation of a job (page contents omitted)
 */
export function toAssessmentView(job: IAssessmentJob): IAssessmentView {
  return {
    id: job.id,
    status: job.status,
    catalog: job.catalog,
    settings: job.settings,
    useLlm: job.useLlm,
    summarize: job.summarize,
    organizations: job.organizations,
    completedOrganizations: job.outcomes.length,
    outcomes: job.outcomes.map((outcome) => ({
      organization: outcome.organization,
      totalPages: outcome.crawl?.totalPages ?? 0,
      successfulPages: outcome.crawl?.successfulPages ?? 0,
      crawlErrors: outcome.crawl ? [...outcome.crawl.errors] : [],
      evaluation: outcome.evaluation,
      summary: outcome.summary,
      error: outcome.error,
    })),
    progressMessage: job.progressMessage,
    errorMessage: job.errorMessage,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export const assessmentService = new AssessmentService();
