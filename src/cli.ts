#!/usr/bin/env node
/**
 * Openness Crawler CLI
 * Batch assessment from a CSV file, catalog listing and LLM connectivity check
 */

import fs from 'fs/promises';
import path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { env } from './config/env';
import { createAssessmentRunner } from './lib/assessment';
import { CatalogLoader, flattenCatalog } from './lib/catalog';
import { getAvailableStrategies } from './lib/crawling';
import type { CrawlStrategy } from './lib/crawling';
import { errorMessage } from './lib/errors';
import { parseOrganizations, resultsToCsv } from './lib/export/csv';
import { createLLMClientFromEnv } from './lib/llm';
import { exportStatisticsReport, StatisticsCollector } from './lib/statistics';
import type { ReportFormat } from './lib/statistics';

interface AssessOptions {
  input: string;
  catalog: string;
  output: string;
  strategy?: CrawlStrategy;
  maxPages?: number;
  stats?: string;
  llm: boolean;
  summaries?: boolean;
}

const program = new Command();

program
  .name('openness-crawler')
  .description('Crawl organization websites and assess openness criteria')
  .version('1.0.0');

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function reportFormatFor(file: string): ReportFormat {
  const extension = path.extname(file).toLowerCase();
  if (extension === '.md') {
    return 'markdown';
  }
  if (extension === '.csv') {
    return 'csv';
  }
  return 'json';
}

/**
 * Accept either a catalog name from CATALOG_DIR or a path to a YAML file
 */
function resolveCatalog(catalog: string): { loader: CatalogLoader; name: string } {
  const extension = path.extname(catalog).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    return {
      loader: new CatalogLoader(path.dirname(catalog)),
      name: path.basename(catalog, extension),
    };
  }
  return { loader: new CatalogLoader(), name: catalog };
}

program
  .command('assess')
  .description('Assess every organization listed in a CSV file')
  .requiredOption('-i, --input <path>', 'CSV file with organization name and URL columns')
  .requiredOption('-c, --catalog <name>', 'Catalog name or path to a catalog YAML file')
  .option('-o, --output <path>', 'Results CSV file', 'results.csv')
  .addOption(new Option('--strategy <strategy>', 'Crawl strategy').choices(getAvailableStrategies()))
  .option('--max-pages <n>', 'Maximum pages per organization', parsePositiveInt)
  .option('--stats <path>', 'Statistics report file (.json, .md or .csv)')
  .option('--no-llm', 'Run without the LLM even when it is configured')
  .option('--summaries', 'Print an LLM summary for every evaluated organization')
  .action(async (options: AssessOptions) => {
    const controller = new AbortController();
    const onInterrupt = (): void => {
      console.log('\nCancelling after the current page...');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const organizations = parseOrganizations(await fs.readFile(options.input, 'utf-8'));
      if (organizations.length === 0) {
        console.error(`No organizations found in ${options.input}`);
        process.exitCode = 1;
        return;
      }

      const { loader, name } = resolveCatalog(options.catalog);
      const criteria = flattenCatalog(await loader.loadCatalog(name));
      const llmClient = options.llm ? createLLMClientFromEnv() : null;

      console.log(`Assessing ${organizations.length} organization(s) against ${criteria.length} criteria from '${name}'`);
      if (!llmClient) {
        console.log('LLM disabled: pattern matching only');
      }

      const runner = createAssessmentRunner(criteria, {
        llmClient,
        summarizer: options.summaries ? llmClient : null,
        settings: {
          ...(options.strategy ? { strategy: options.strategy } : {}),
          ...(options.maxPages ? { maxPages: options.maxPages } : {}),
        },
      });

      const result = await runner.run(organizations, {
        signal: controller.signal,
        onProgress: (message) => console.log(message),
      });

      const evaluations = result.outcomes.flatMap((outcome) => (outcome.evaluation ? [outcome.evaluation] : []));
      await fs.writeFile(options.output, resultsToCsv(evaluations), 'utf-8');
      console.log(`Results written to ${options.output}`);

      if (options.stats) {
        const statistics = new StatisticsCollector().collect(result.outcomes, name);
        await fs.writeFile(options.stats, exportStatisticsReport(statistics, reportFormatFor(options.stats)), 'utf-8');
        console.log(`Statistics written to ${options.stats}`);
      }

      for (const outcome of result.outcomes) {
        if (outcome.evaluation) {
          const { fulfilledCriteria, totalCriteria, fulfillmentPercentage } = outcome.evaluation;
          console.log(
            `  ${outcome.organization.name}: ${fulfilledCriteria}/${totalCriteria} (${fulfillmentPercentage.toFixed(1)}%)`
          );
          if (outcome.summary) {
            console.log(`\n${outcome.summary}\n`);
          }
        } else {
          console.log(`  ${outcome.organization.name}: ${outcome.error ?? 'not assessed'}`);
        }
      }

      if (result.cancelled) {
        process.exitCode = 130;
      }
    } catch (error) {
      console.error('Fatal Error:', errorMessage(error));
      process.exitCode = 1;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });

program
  .command('catalogs')
  .description(`List the criteria catalogs in ${env.CATALOG_DIR}`)
  .action(async () => {
    try {
      const loader = new CatalogLoader();
      const names = await loader.listCatalogs();
      if (names.length === 0) {
        console.log('No catalogs found');
        return;
      }
      for (const name of names) {
        try {
          const info = await loader.getCatalogInfo(name);
          console.log(`${info.id}\t${info.name} (v${info.version}, ${info.totalCriteria} criteria)`);
        } catch (error) {
          console.log(`${name}\tinvalid: ${errorMessage(error)}`);
        }
      }
    } catch (error) {
      console.error('Fatal Error:', errorMessage(error));
      process.exitCode = 1;
    }
  });

program
  .command('check-llm')
  .description('Verify that the configured LLM endpoint answers')
  .action(async () => {
    const client = createLLMClientFromEnv();
    if (!client) {
      console.log('LLM is not configured (set OPENAI_API_KEY and LLM_ENABLED=true)');
      process.exitCode = 1;
      return;
    }

    console.log(`Testing ${env.OPENAI_MODEL} at ${env.OPENAI_BASE_URL ?? 'the default endpoint'}...`);
    if (await client.testConnection()) {
      console.log('LLM connection OK');
    } else {
      console.error('LLM connection failed');
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Fatal Error:', errorMessage(error));
  process.exitCode = 1;
});
