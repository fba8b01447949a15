/**
 * Statistics reports
 */

import { stringify } from 'csv-stringify/sync';
import { CSV_DELIMITER } from '../export/csv';
import { AssessmentStatistics, ReportFormat } from './statistics.types';

export function createMarkdownReport(statistics: AssessmentStatistics): string {
  const { summary, comparison } = statistics;
  const lines = [
    '# Openness Assessment Report',
    '',
    `Generated: ${statistics.generatedAt}`,
    `Catalog: ${statistics.catalogName}`,
    '',
    '## Summary',
    '',
    `- **Organizations Processed**: ${summary.totalOrganizations}`,
    `- **Success Rate**: ${summary.successRatePercentage.toFixed(1)}%`,
    `- **Average Fulfillment**: ${summary.averageFulfillmentPercentage.toFixed(1)}%`,
    `- **Average Confidence**: ${summary.averageConfidence.toFixed(2)}`,
    `- **High Confidence Evaluations**: ${summary.highConfidenceEvaluations}`,
    `- **Manual Review Required**: ${summary.manualReviewRequired}`,
    '',
    '## Top Performers',
    '',
  ];

  if (comparison.topPerformers.length === 0) {
    lines.push('No organizations evaluated.');
  }
  comparison.topPerformers.forEach((entry, index) => {
    lines.push(`${index + 1}. ${entry.organization}: ${entry.fulfillmentPercentage.toFixed(1)}%`);
  });

  lines.push('', '## Dimensions', '');
  const dimensions = Object.entries(comparison.dimensionPerformance);
  if (dimensions.length === 0) {
    lines.push('No dimension data.');
  }
  for (const [dimension, percentage] of dimensions) {
    lines.push(`- ${dimension}: ${percentage.toFixed(1)}%`);
  }
  lines.push(
    '',
    `Strongest dimension: **${comparison.strongestDimension || 'N/A'}**`,
    `Weakest dimension: **${comparison.weakestDimension || 'N/A'}**`,
    '',
    '## Crawling',
    '',
    `- **Total Crawling Time**: ${summary.totalCrawlingMinutes.toFixed(1)} minutes`,
    `- **Pages Crawled**: ${statistics.crawling.totalPagesCrawled}`,
    ''
  );

  return lines.join('\n');
}

/**
 * Summary metrics as Metric;Value rows
 */
export function createCsvReport(statistics: AssessmentStatistics): string {
  return stringify(
    Object.entries(statistics.summary).map(([metric, value]) => ({ Metric: metric, Value: String(value) })),
    { header: true, delimiter: CSV_DELIMITER, columns: ['Metric', 'Value'] }
  );
}

export function exportStatisticsReport(statistics: AssessmentStatistics, format: ReportFormat = 'json'): string {
  switch (format) {
    case 'json':
      return JSON.stringify(statistics, null, 2);
    case 'markdown':
      return createMarkdownReport(statistics);
    case 'csv':
      return createCsvReport(statistics);
  }
}

export function isReportFormat(value: unknown): value is ReportFormat {
  return value === 'json' || value === 'markdown' || value === 'csv';
}
