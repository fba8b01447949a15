/**
 * Assessment Runner Tests
 */

import { AssessmentRunner, createAssessmentRunner } from '../assessment-runner';
import type { AssessmentSettings, Organization } from '../assessment.types';
import { CrawlOrchestrator, CrawlStrategy } from '../../crawling';
import { CriteriaEvaluator, EvidenceStrategyType } from '../../evaluation';
import type { IEvidenceStrategy } from '../../evaluation';
import { PageFetcher } from '../../fetching';
import type { OrganizationSummarizer } from '../../llm';
import { createInstantSleep, createStubBackend } from '../../../__tests__/helpers/mocks';
import { BASE_URL, criterion, homepageHtml } from '../../../__tests__/helpers/fixtures';

const SPORT_URL = 'https://sport.example.org/';

const subpage = (title: string) => `<html><head><title>${title}</title></head><body>${title}</body></html>`;

const sites: Record<string, string | number> = {
  [BASE_URL]: homepageHtml,
  'https://verein.example.org/ueber-uns': subpage('Über uns'),
  'https://verein.example.org/transparenz': subpage('Transparenz'),
  'https://verein.example.org/kontakt': subpage('Kontakt'),
  [SPORT_URL]: '<html><head><title>Sportclub</title></head><body>Satzung und Vorstand</body></html>',
};

const organizations: Organization[] = [
  { name: 'Musterverein', url: BASE_URL },
  { name: 'Sportclub', url: SPORT_URL },
];

const settings: AssessmentSettings = {
  strategy: CrawlStrategy.LIMITED,
  maxPages: 3,
  intraDomainDelay: 250,
  respectRobotsTxt: false,
  interDomainDelay: 2000,
  confidenceThreshold: 0.5,
};

function setup(
  evaluator: CriteriaEvaluator = new CriteriaEvaluator([criterion()], { llmClient: null, confidenceThreshold: 0.5 }),
  summarizer?: OrganizationSummarizer
) {
  const stub = createStubBackend(sites);
  const sleep = createInstantSleep();
  const orchestrator = new CrawlOrchestrator(
    { fetcher: new PageFetcher(stub.backend, { timeout: 1000 }), sleep },
    settings
  );
  const runner = new AssessmentRunner({ orchestrator, evaluator, summarizer, sleep }, settings);
  return { runner, calls: stub.calls, sleep };
}

describe('AssessmentRunner', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should crawl and evaluate organizations one after another', async () => {
    const { runner, calls } = setup();
    const onOutcome = jest.fn();

    const result = await runner.run(organizations, { onOutcome });

    expect(calls).toEqual([
      BASE_URL,
      'https://verein.example.org/ueber-uns',
      'https://verein.example.org/transparenz',
      SPORT_URL,
    ]);
    expect(result.cancelled).toBe(false);
    expect(result.outcomes.map((outcome) => outcome.evaluation?.fulfilledCriteria)).toEqual([1, 0]);
    expect(result.outcomes.map((outcome) => outcome.crawl?.totalPages)).toEqual([3, 1]);
    expect(onOutcome).toHaveBeenCalledTimes(2);
    expect(onOutcome).toHaveBeenNthCalledWith(1, result.outcomes[0], 0, 2);
  });

  it('should wait between organizations but not after the last', async () => {
    const { runner, sleep } = setup();

    await runner.run(organizations);

    expect(sleep.mock.calls).toEqual([
      [250, undefined],
      [250, undefined],
      [2000, undefined],
    ]);
  });

  it('should report progress', async () => {
    const { runner } = setup();
    const messages: string[] = [];

    await runner.run(organizations, { onProgress: (message) => messages.push(message) });

    expect(messages[0]).toBe('Processing organization 1/2: Musterverein');
    expect(messages).toContain('Evaluating Musterverein');
    expect(messages).toContain('Criterion 1/1 of Musterverein: Jahresbericht fulfilled');
    expect(messages).toContain('Musterverein: 1/1 criteria fulfilled');
    expect(messages).toContain('Criterion 1/1 of Sportclub: Jahresbericht not fulfilled');
    expect(messages).toContain('Waiting 2000 ms before the next organization');
    expect(messages).toContain('Processing organization 2/2: Sportclub');
    expect(messages[messages.length - 1]).toBe('Assessment finished: 2 organization(s)');
  });

  it('should attach an LLM summary to every evaluated organization', async () => {
    const summarizeOrganization = jest.fn(async (name: string) => `Zusammenfassung für ${name}`);
    const { runner } = setup(undefined, { summarizeOrganization });
    const messages: string[] = [];

    const result = await runner.run(organizations, { onProgress: (message) => messages.push(message) });

    expect(result.outcomes.map((outcome) => outcome.summary)).toEqual([
      'Zusammenfassung für Musterverein',
      'Zusammenfassung für Sportclub',
    ]);
    expect(summarizeOrganization).toHaveBeenNthCalledWith(1, 'Musterverein', result.outcomes[0].evaluation);
    expect(messages).toContain('Summarizing Sportclub');
  });

  it('should leave the summary out without a summarizer', async () => {
    const { runner } = setup();

    const result = await runner.run([organizations[0]]);

    expect(result.outcomes[0].summary).toBeUndefined();
  });

  it('should record a failing organization and continue', async () => {
    const failing: IEvidenceStrategy = {
      name: 'failing',
      type: EvidenceStrategyType.PATTERN,
      isAvailable: () => true,
      evaluate: async (_criterion, page) => {
        if (page.url.startsWith(BASE_URL)) {
          throw new Error('Analysis exploded');
        }
        return null;
      },
    };
    const { runner } = setup(new CriteriaEvaluator([criterion()], { confidenceThreshold: 0.5, stages: [{ strategy: failing }] }));

    const result = await runner.run(organizations);

    expect(result.outcomes[0].error).toBe('Analysis exploded');
    expect(result.outcomes[0].evaluation).toBeNull();
    expect(result.outcomes[0].crawl?.successfulPages).toBe(3);
    expect(result.outcomes[1].error).toBeUndefined();
    expect(result.outcomes[1].evaluation?.totalCriteria).toBe(1);
  });

  it('should stop after the partial crawl of the current organization when cancelled', async () => {
    const { runner, calls, sleep } = setup();
    const controller = new AbortController();
    const messages: string[] = [];

    const result = await runner.run(organizations, {
      signal: controller.signal,
      onProgress: (message) => {
        messages.push(message);
        if (message === 'Crawled page 2/3: Ueber Uns') {
          controller.abort();
        }
      },
    });

    expect(result.cancelled).toBe(true);
    expect(result.outcomes).toHaveLength(1);
    expect(result.outcomes[0].crawl?.cancelled).toBe(true);
    expect(result.outcomes[0].crawl?.totalPages).toBe(2);
    expect(result.outcomes[0].evaluation).toBeNull();
    expect(result.outcomes[0].error).toBe('Assessment cancelled');
    expect(calls).toEqual([BASE_URL, 'https://verein.example.org/ueber-uns']);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(messages[messages.length - 1]).toBe('Assessment cancelled after 1/2 organization(s)');
  });

  it('should not start when already cancelled', async () => {
    const { runner, calls } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await runner.run(organizations, { signal: controller.signal });

    expect(result).toMatchObject({ outcomes: [], cancelled: true });
    expect(calls).toEqual([]);
  });
});

describe('createAssessmentRunner', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should merge settings over the defaults and use the given collaborators', async () => {
    const stub = createStubBackend(sites);
    const sleep = createInstantSleep();

    const runner = createAssessmentRunner([criterion()], {
      settings: { strategy: CrawlStrategy.HOMEPAGE_ONLY, interDomainDelay: 10 },
      fetcher: new PageFetcher(stub.backend, { timeout: 1000 }),
      sleep,
    });
    const result = await runner.run([organizations[1]]);

    expect(runner.settings.strategy).toBe(CrawlStrategy.HOMEPAGE_ONLY);
    expect(runner.settings.interDomainDelay).toBe(10);
    expect(runner.settings.maxPages).toBe(10);
    expect(stub.calls).toEqual([SPORT_URL]);
    expect(result.outcomes[0].evaluation?.fulfilledCriteria).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });
});
