/**
 * LLM Prompts
 */

import type { CriterionAnalysisRequest, SubpageSelectionRequest } from './llm.types';

export const MAX_ANALYSIS_CONTENT_LENGTH = 3000;

export const SELECTION_SYSTEM_PROMPT =
  'Du bist Experte für Organisationsanalyse. Wähle die Webseiten aus, die für die Bewertung von Offenheitskriterien am aufschlussreichsten sind. Antworte ausschließlich mit JSON.';

export const ANALYSIS_SYSTEM_PROMPT =
  'Du bewertest die Offenheit von Organisationen anhand ihrer Webseiten. Entscheide, ob ein Kriterium erfüllt ist. Antworte ausschließlich mit JSON.';

export const SUMMARY_SYSTEM_PROMPT =
  'Du fasst Analyseergebnisse knapp und verständlich für Entscheidungsträger zusammen.';

/**
 * Cut page text to what the analysis prompt carries
 */
export function truncateContent(content: string, maxLength: number = MAX_ANALYSIS_CONTENT_LENGTH): string {
  return content.length > maxLength ? `${content.substring(0, maxLength)}...` : content;
}

export function buildSelectionPrompt(request: SubpageSelectionRequest): string {
  const pages = request.candidates.map((candidate) => `- ${candidate.title}: ${candidate.url}`).join('\n');
  const criteria = request.criteriaNames.map((name) => `- ${name}`).join('\n');

  return `Organisation: ${request.organizationName}
Hauptseite: ${request.baseUrl}

Zu bewertende Kriterien:
${criteria}

Verfügbare Unterseiten:
${pages}

Wähle bis zu ${request.maxPages} Unterseiten aus der Liste, die am wahrscheinlichsten Belege für diese Kriterien enthalten
(z. B. Über uns, Transparenz, Publikationen, Open Data, Governance, Barrierefreiheit, Kontakt).
Verwende nur URLs aus der Liste und sortiere nach Relevanz, höchste zuerst.

Antwortformat:
{"selected_urls": ["..."], "reasoning": "...", "relevance_scores": {"<url>": 0.9}}`;
}

export function buildAnalysisPrompt(request: CriterionAnalysisRequest): string {
  const source = request.sourceUrl ? `\nQuelle: ${request.sourceUrl}` : '';

  return `Ist das Kriterium "${request.criterionName}" auf dieser Webseite erfüllt?${source}

Kriterium: ${request.criterionName}
Beschreibung: ${request.criterionDescription}
Suchbegriffe: ${request.patterns.join(', ')}

Webseiteninhalt:
${request.content}

Berücksichtige direkte Erwähnungen der Suchbegriffe, inhaltliche Übereinstimmung mit der Beschreibung und den Kontext.

Antwortformat:
{"fulfilled": true, "confidence": 0.0, "justification": "...", "evidence": ["..."], "found_patterns": ["..."]}`;
}

export function buildSummaryPrompt(organizationName: string, results: unknown): string {
  return `Fasse die Offenheitsanalyse der Organisation "${organizationName}" in 200 bis 300 Wörtern zusammen.
Nenne Stärken, Verbesserungspotenziale, eine Gesamteinschätzung und konkrete Empfehlungen.

Ergebnisse:
${JSON.stringify(results, null, 2)}`;
}
