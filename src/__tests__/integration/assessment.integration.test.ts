/**
 * Assessment Integration Tests
 * Service, runner, crawler and evaluator wired together against an in-memory site
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { FetchBackend } from '../../lib/fetching';
import { ApiError } from '../../middleware/error-handler';
import { AssessmentStatus } from '../../modules/assessment/assessment.types';
import { createTestService, TEST_CATALOG, TEST_SETTINGS, waitFor } from '../helpers/assessment';
import { BASE_URL, homepageHtml } from '../helpers/fixtures';
import { createMockLLMClient, createStubBackend } from '../helpers/mocks';

describe('Assessment Integration Tests', () => {
  let catalogDir: string;

  beforeEach(async () => {
    catalogDir = await mkdtemp(path.join(os.tmpdir(), 'assessment-'));
    await writeFile(path.join(catalogDir, 'testkatalog.yaml'), TEST_CATALOG);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(catalogDir, { recursive: true, force: true });
  });

  it('should run a queued job to completion with results and statistics', async () => {
    const stub = createStubBackend({ [BASE_URL]: homepageHtml });
    const { service, emit, createRunner } = createTestService(catalogDir, stub.backend);

    const job = await service.createJob({
      catalog: 'testkatalog',
      organizations: [{ name: 'Musterverein', url: BASE_URL }],
      settings: TEST_SETTINGS,
    });
    expect(emit).toHaveBeenNthCalledWith(1, {
      assessmentId: job.id,
      status: AssessmentStatus.QUEUED,
      message: 'Assessment created and queued',
      completed: 0,
      total: 1,
    });

    await waitFor(async () => (await service.getJob(job.id)).status === AssessmentStatus.COMPLETED);

    const finished = await service.getJob(job.id);
    expect(finished.startedAt).toBeInstanceOf(Date);
    expect(finished.completedAt).toBeInstanceOf(Date);
    expect(finished.outcomes).toHaveLength(1);
    expect(finished.outcomes[0].evaluation?.fulfilledCriteria).toBe(1);
    expect(finished.outcomes[0].evaluation?.fulfillmentPercentage).toBe(50);
    expect(finished.progressMessage).toBe('Assessment completed');
    expect(stub.calls).toEqual([BASE_URL]);
    expect(createRunner.mock.calls[0][1].llmClient).toBeNull();

    const csvLines = (await service.getResultsCsv(job.id)).trimEnd().split('\n');
    expect(csvLines).toHaveLength(3);
    expect(csvLines[0]).toBe('Organisation;Criterion;Evaluation;Confidence;Justification;Source');
    expect(csvLines[1].startsWith('Musterverein;Jahresbericht;1;0.5;Evidence found via text match:')).toBe(true);
    expect(csvLines[2]).toBe(`Musterverein;Satzung;0;0;No sufficient evidence found;${BASE_URL}`);

    const statistics = await service.getStatistics(job.id);
    expect(statistics.catalogName).toBe('testkatalog');
    expect(statistics.crawling.successfulCrawls).toBe(1);
    expect(statistics.criteria.criterionHitRate).toEqual({ jahresbericht: 100, satzung: 0 });

    const report = await service.getStatisticsReport(job.id, 'markdown');
    expect(report.split('\n')[0]).toBe('# Openness Assessment Report');
  });

  it('should store LLM summaries when requested', async () => {
    const llm = createMockLLMClient();
    llm.analyzeCriterion.mockResolvedValue({ fulfilled: false, confidence: 0, justification: '', evidence: [] });
    const summarizeOrganization = jest.fn(async (name: string) => `Zusammenfassung für ${name}`);
    const stub = createStubBackend({ [BASE_URL]: homepageHtml });
    const { service } = createTestService(catalogDir, stub.backend, () => ({ ...llm.client, summarizeOrganization }));

    const job = await service.createJob({
      catalog: 'testkatalog',
      organizations: [{ name: 'Musterverein', url: BASE_URL }],
      settings: { ...TEST_SETTINGS, useLlm: true, summarize: true },
    });
    await waitFor(async () => (await service.getJob(job.id)).status === AssessmentStatus.COMPLETED);

    const finished = await service.getJob(job.id);
    expect(finished.summarize).toBe(true);
    expect(finished.outcomes[0].summary).toBe('Zusammenfassung für Musterverein');
    expect(summarizeOrganization).toHaveBeenCalledTimes(1);
  });

  it('should reject a missing catalog with 404', async () => {
    const { service } = createTestService(catalogDir, createStubBackend({}).backend);

    const attempt = service.createJob({
      catalog: 'unbekannt',
      organizations: [{ name: 'Musterverein', url: BASE_URL }],
      settings: TEST_SETTINGS,
    });

    await expect(attempt).rejects.toBeInstanceOf(ApiError);
    await expect(attempt).rejects.toMatchObject({ statusCode: 404, message: "Catalog 'unbekannt' not found" });
  });

  it('should reject an invalid catalog with 400', async () => {
    await writeFile(path.join(catalogDir, 'kaputt.yaml'), 'metadata: [');
    const { service } = createTestService(catalogDir, createStubBackend({}).backend);

    await expect(
      service.createJob({
        catalog: 'kaputt',
        organizations: [{ name: 'Musterverein', url: BASE_URL }],
        settings: TEST_SETTINGS,
      })
    ).rejects.toMatchObject({ statusCode: 400 });
  });

  it('should take organizations from CSV and reject an empty list', async () => {
    const stub = createStubBackend({ [BASE_URL]: homepageHtml });
    const { service } = createTestService(catalogDir, stub.backend);

    const job = await service.createJob({
      catalog: 'testkatalog',
      organizationsCsv: `Organisation;URL\nMusterverein;${BASE_URL}\n`,
      settings: TEST_SETTINGS,
    });
    expect(job.organizations).toEqual([{ name: 'Musterverein', url: BASE_URL }]);
    await waitFor(async () => (await service.getJob(job.id)).status === AssessmentStatus.COMPLETED);

    await expect(
      service.createJob({ catalog: 'testkatalog', organizations: [], settings: TEST_SETTINGS })
    ).rejects.toMatchObject({ statusCode: 400, message: 'At least one organization is required' });
  });

  it('should cancel a running job and keep the partial outcome', async () => {
    let markStarted: () => void = () => undefined;
    const fetchStarted = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const hanging: FetchBackend = {
      name: 'hanging',
      fetch: (_url, options) =>
        new Promise((_resolve, reject) => {
          markStarted();
          options.signal?.addEventListener('abort', () => reject(new Error('Aborted')), { once: true });
        }),
    };
    const { service } = createTestService(catalogDir, hanging);

    const job = await service.createJob({
      catalog: 'testkatalog',
      organizations: [
        { name: 'Musterverein', url: BASE_URL },
        { name: 'Zweiter Verein', url: 'https://zweiter.example.org/' },
      ],
      settings: TEST_SETTINGS,
    });
    await fetchStarted;

    const cancelled = await service.cancelJob(job.id);
    expect(cancelled.status).toBe(AssessmentStatus.CANCELLED);

    await waitFor(async () => (await service.getJob(job.id)).statistics !== null);
    const finished = await service.getJob(job.id);
    expect(finished.status).toBe(AssessmentStatus.CANCELLED);
    expect(finished.outcomes).toHaveLength(1);
    expect(finished.outcomes[0].error).toBe('Assessment cancelled');
    expect(finished.outcomes[0].crawl?.cancelled).toBe(true);
  });

  it('should return a finished job unchanged when cancelled again', async () => {
    const stub = createStubBackend({ [BASE_URL]: homepageHtml });
    const { service } = createTestService(catalogDir, stub.backend);
    const job = await service.createJob({
      catalog: 'testkatalog',
      organizations: [{ name: 'Musterverein', url: BASE_URL }],
      settings: TEST_SETTINGS,
    });
    await waitFor(async () => (await service.getJob(job.id)).status === AssessmentStatus.COMPLETED);

    const again = await service.cancelJob(job.id);

    expect(again.status).toBe(AssessmentStatus.COMPLETED);
  });

  it('should mark the job failed when the runner cannot be built', async () => {
    const { service, createRunner } = createTestService(catalogDir, createStubBackend({}).backend);
    createRunner.mockImplementation(() => {
      throw new Error('runner boom');
    });

    const job = await service.createJob({
      catalog: 'testkatalog',
      organizations: [{ name: 'Musterverein', url: BASE_URL }],
      settings: TEST_SETTINGS,
    });
    await waitFor(async () => (await service.getJob(job.id)).status === AssessmentStatus.FAILED);

    const failed = await service.getJob(job.id);
    expect(failed.errorMessage).toBe('runner boom');
    expect(failed.progressMessage).toBe('Assessment failed: runner boom');
  });

  it('should throw 404 for an unknown job', async () => {
    const { service } = createTestService(catalogDir, createStubBackend({}).backend);

    await expect(service.getJob('missing')).rejects.toMatchObject({ statusCode: 404, message: 'Assessment not found' });
  });
});
