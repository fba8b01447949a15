/**
 * Assessment Runner
 * Crawls and evaluates organizations one after another
 */

import { env } from '../../config/env';
import { CrawlOrchestrator, defaultCrawlingConfig, sleep as defaultSleep } from '../crawling';
import type { Sleep } from '../crawling';
import { CancelledError, errorMessage } from '../errors';
import { CriteriaEvaluator } from '../evaluation';
import type { CriterionDefinition } from '../evaluation';
import { createPageFetcher } from '../fetching';
import type { PageFetcher } from '../fetching';
import type { LLMClient, OrganizationSummarizer } from '../llm';
import {
  AssessmentRunResult,
  AssessmentSettings,
  Organization,
  OrganizationOutcome,
  ProgressSink,
} from './assessment.types';

export interface AssessmentRunnerDeps {
  orchestrator: CrawlOrchestrator;
  evaluator: CriteriaEvaluator;
  summarizer?: OrganizationSummarizer | null;
  sleep?: Sleep;
}

export interface RunOptions {
  onProgress?: ProgressSink;
  onOutcome?: (outcome: OrganizationOutcome, index: number, total: number) => void;
  signal?: AbortSignal;
}

export function defaultAssessmentSettings(): AssessmentSettings {
  return {
    ...defaultCrawlingConfig(),
    interDomainDelay: env.INTER_DOMAIN_DELAY_MS,
    confidenceThreshold: env.CONFIDENCE_THRESHOLD,
  };
}

export class AssessmentRunner {
  private readonly orchestrator: CrawlOrchestrator;
  private readonly evaluator: CriteriaEvaluator;
  private readonly summarizer: OrganizationSummarizer | null;
  private readonly sleep: Sleep;

  constructor(
    deps: AssessmentRunnerDeps,
    readonly settings: AssessmentSettings = defaultAssessmentSettings()
  ) {
    this.orchestrator = deps.orchestrator;
    this.evaluator = deps.evaluator;
    this.summarizer = deps.summarizer ?? null;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(organizations: readonly Organization[], options: RunOptions = {}): Promise<AssessmentRunResult> {
    const { signal } = options;
    const startTime = Date.now();
    const outcomes: OrganizationOutcome[] = [];
    let cancelled = false;

    const progress = (message: string): void => {
      if (!options.onProgress) {
        return;
      }
      try {
        options.onProgress(message);
      } catch (error) {
        console.warn(`[Assessment] Progress callback failed: ${errorMessage(error)}`);
      }
    };

    const record = (outcome: OrganizationOutcome, index: number): void => {
      outcomes.push(outcome);
      options.onOutcome?.(outcome, index, organizations.length);
    };

    for (const [index, organization] of organizations.entries()) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      progress(`Processing organization ${index + 1}/${organizations.length}: ${organization.name}`);
      const outcome = await this.assess(organization, progress, signal);
      record(outcome, index);

      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      if (index < organizations.length - 1 && this.settings.interDomainDelay > 0) {
        progress(`Waiting ${this.settings.interDomainDelay} ms before the next organization`);
        try {
          await this.sleep(this.settings.interDomainDelay, signal);
        } catch (error) {
          if (signal?.aborted) {
            cancelled = true;
            break;
          }
          throw error;
        }
      }
    }

    const durationMs = Date.now() - startTime;
    progress(
      cancelled
        ? `Assessment cancelled after ${outcomes.length}/${organizations.length} organization(s)`
        : `Assessment finished: ${outcomes.length} organization(s)`
    );
    console.log(`[Assessment] ${outcomes.length}/${organizations.length} organization(s) in ${durationMs} ms`);

    return { outcomes, cancelled, durationMs };
  }

  private async assess(
    organization: Organization,
    progress: ProgressSink,
    signal?: AbortSignal
  ): Promise<OrganizationOutcome> {
    let crawl: OrganizationOutcome['crawl'] = null;

    try {
      crawl = await this.orchestrator.crawlOrganization({
        organizationName: organization.name,
        baseUrl: organization.url,
        criteriaNames: this.evaluator.criteriaNames,
        config: {
          strategy: this.settings.strategy,
          maxPages: this.settings.maxPages,
          intraDomainDelay: this.settings.intraDomainDelay,
          respectRobotsTxt: this.settings.respectRobotsTxt,
        },
        onStatus: progress,
        signal,
      });

      if (crawl.cancelled) {
        return { organization, crawl, evaluation: null, error: 'Assessment cancelled' };
      }

      progress(`Evaluating ${organization.name}`);
      const evaluation = await this.evaluator.evaluateOrganization(crawl, {
        signal,
        onProgress: (completed, total, result) =>
          progress(
            `Criterion ${completed}/${total} of ${organization.name}: ${result.criterionName} ${result.evaluation ? 'fulfilled' : 'not fulfilled'}`
          ),
      });
      progress(
        `${organization.name}: ${evaluation.fulfilledCriteria}/${evaluation.totalCriteria} criteria fulfilled`
      );

      if (!this.summarizer) {
        return { organization, crawl, evaluation };
      }
      progress(`Summarizing ${organization.name}`);
      const summary = await this.summarizer.summarizeOrganization(organization.name, evaluation);
      return { organization, crawl, evaluation, summary };
    } catch (error) {
      if (error instanceof CancelledError) {
        return { organization, crawl, evaluation: null, error: 'Assessment cancelled' };
      }
      console.error(`[Assessment] Assessing ${organization.name} failed:`, error);
      progress(`${organization.name} could not be assessed: ${errorMessage(error)}`);
      return { organization, crawl, evaluation: null, error: errorMessage(error) };
    }
  }
}

export interface CreateAssessmentRunnerOptions {
  settings?: Partial<AssessmentSettings>;
  llmClient?: LLMClient | null;
  summarizer?: OrganizationSummarizer | null;
  fetcher?: PageFetcher;
  sleep?: Sleep;
}

/**
 * Runner wired with a page fetcher and evaluator for a criteria list
 */
export function createAssessmentRunner(
  criteria: readonly CriterionDefinition[],
  options: CreateAssessmentRunnerOptions = {}
): AssessmentRunner {
  const settings: AssessmentSettings = { ...defaultAssessmentSettings(), ...options.settings };
  const llmClient = options.llmClient ?? null;

  const orchestrator = new CrawlOrchestrator(
    {
      fetcher: options.fetcher ?? createPageFetcher(),
      llmClient: llmClient ?? undefined,
      sleep: options.sleep,
    },
    settings
  );
  const evaluator = new CriteriaEvaluator(criteria, {
    confidenceThreshold: settings.confidenceThreshold,
    caseSensitive: env.CASE_SENSITIVE,
    llmClient,
  });

  return new AssessmentRunner({ orchestrator, evaluator, summarizer: options.summarizer, sleep: options.sleep }, settings);
}
