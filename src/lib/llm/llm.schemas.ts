/**
 * LLM response schemas
 */

import { z } from 'zod';

export const subpageSelectionSchema = z.object({
  selected_urls: z.array(z.string()),
  reasoning: z.string().optional(),
  relevance_scores: z.record(z.coerce.number()).optional(),
});

export const criterionAnalysisSchema = z.object({
  fulfilled: z.boolean(),
  confidence: z.coerce.number(),
  justification: z.string().default(''),
  evidence: z.array(z.string()).default([]),
  found_patterns: z.array(z.string()).optional(),
});

export type SubpageSelectionPayload = z.infer<typeof subpageSelectionSchema>;
export type CriterionAnalysisPayload = z.infer<typeof criterionAnalysisSchema>;

/**
 * Pull the JSON object out of a model reply (tolerates code fences and chatter)
 */
export function extractJson(text: string): unknown {
  const cleanText = text
    .trim()
    .replace(/```json\s*/g, '')
    .replace(/```\s*$/g, '');

  const jsonMatch = cleanText.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error('No JSON found in response');
  }

  return JSON.parse(jsonMatch[0]);
}
