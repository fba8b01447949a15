/**
 * CSV import and export
 * Semicolon-separated organization lists in, criterion results out
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { CrawlerError, errorMessage } from '../errors';
import type { Organization } from '../assessment/assessment.types';
import type { OrganizationEvaluation } from '../evaluation';

export const CSV_DELIMITER = ';';

const HEADER_CELLS = ['organisation', 'url'];

export const RESULT_COLUMNS = ['Organisation', 'Criterion', 'Evaluation', 'Confidence', 'Justification', 'Source'] as const;

export type ResultRow = Record<(typeof RESULT_COLUMNS)[number], string | number>;

/**
 * Read organizations from the first two columns; a header row is optional
 */
export function parseOrganizations(csv: string): Organization[] {
  let rows: string[][];
  try {
    rows = parse(csv, {
      delimiter: CSV_DELIMITER,
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new CrawlerError(`Organizations CSV could not be parsed: ${errorMessage(error)}`, 'CSV_INVALID', {
      cause: error,
    });
  }

  if (rows.length === 0) {
    throw new CrawlerError('Organizations CSV is empty', 'CSV_INVALID');
  }

  const hasHeader = rows[0].some((cell) => HEADER_CELLS.includes(cell.toLowerCase()));
  const dataRows = hasHeader ? rows.slice(1) : rows;

  const columns = Math.max(0, ...rows.map((row) => row.length));
  if (columns < 2) {
    throw new CrawlerError(`Organizations CSV must have at least 2 columns, found ${columns}`, 'CSV_INVALID');
  }

  const organizations = dataRows
    .map(([name = '', url = '']) => ({ name: name.trim(), url: url.trim() }))
    .filter((organization) => organization.name.length > 0 && organization.url.length > 0);

  const invalid = organizations.filter((organization) => !/^https?:\/\//.test(organization.url));
  if (invalid.length > 0) {
    console.warn(`[CSV] Found ${invalid.length} potentially invalid URL(s): ${invalid.map((o) => o.url).join(', ')}`);
  }

  console.log(`[CSV] Loaded ${organizations.length} organization(s)${hasHeader ? ' (with header)' : ''}`);
  return organizations;
}

/**
 * One row per organization and criterion
 */
export function resultsToRows(evaluations: readonly OrganizationEvaluation[]): ResultRow[] {
  return evaluations.flatMap((evaluation) =>
    evaluation.criteriaResults.map((result) => ({
      Organisation: evaluation.organizationName,
      Criterion: result.criterionName,
      Evaluation: result.evaluation ? 1 : 0,
      Confidence: result.confidence,
      Justification: result.justification,
      Source: result.sourceUrl,
    }))
  );
}

export function resultsToCsv(evaluations: readonly OrganizationEvaluation[]): string {
  return stringify(resultsToRows(evaluations), {
    header: true,
    delimiter: CSV_DELIMITER,
    columns: [...RESULT_COLUMNS],
  });
}
