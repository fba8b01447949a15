/**
 * Criteria catalog schema
 */

import { z } from 'zod';

const textField = z
  .union([z.string(), z.number(), z.date()])
  .transform((value) => (value instanceof Date ? value.toISOString().slice(0, 10) : String(value)));

export const criterionEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  type: z.enum(['operational', 'strategic'], {
    errorMap: () => ({ message: 'must be one of: operational, strategic' }),
  }),
  patterns: z
    .record(z.array(z.string(), { invalid_type_error: 'must be a list of strings' }))
    .default({}),
  weight: z.number().default(1),
  confidence_threshold: z.number().min(0).max(1).optional(),
});

export const factorSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  criteria: z.record(criterionEntrySchema),
});

export const dimensionSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  factors: z.record(factorSchema),
});

export const catalogSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    organization_type: z.string().min(1),
    description: z.string().optional(),
    version: textField.optional(),
    created_date: textField.optional(),
    author: z.string().optional(),
  }),
  dimensions: z.record(dimensionSchema),
});

export type CriteriaCatalog = z.infer<typeof catalogSchema>;
export type CatalogCriterion = z.infer<typeof criterionEntrySchema>;

export interface CatalogInfo {
  id: string;
  name: string;
  description: string;
  version: string;
  organizationType: string;
  dimensions: number;
  totalCriteria: number;
}
