/**
 * Assessment request validation
 */

import { z } from 'zod';
import { CrawlStrategy } from '../../lib/crawling';

const organizationSchema = z.object({
  name: z.string().trim().min(1, 'Organization name is required'),
  url: z.string().trim().url('Organization URL must be a valid URL'),
});

export const createAssessmentSchema = z
  .object({
    catalog: z.string().trim().min(1, 'Catalog is required'),
    organizations: z.array(organizationSchema).optional(),
    organizationsCsv: z.string().optional(),
    settings: z
      .object({
        strategy: z.nativeEnum(CrawlStrategy).optional(),
        maxPages: z.number().int().min(1).max(100).optional(),
        intraDomainDelay: z.number().int().min(0).optional(),
        interDomainDelay: z.number().int().min(0).optional(),
        respectRobotsTxt: z.boolean().optional(),
        confidenceThreshold: z.number().min(0).max(1).optional(),
        useLlm: z.boolean().optional(),
        summarize: z.boolean().optional(),
      })
      .default({}),
  })
  .refine((body) => body.organizations !== undefined || body.organizationsCsv !== undefined, {
    message: 'Either organizations or organizationsCsv is required',
    path: ['organizations'],
  });

export type CreateAssessmentRequest = z.infer<typeof createAssessmentSchema>;
