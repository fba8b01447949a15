/**
 * Catalog Controller
 * Lists the criteria catalogs available for assessments
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import { CatalogLoader } from '../../lib/catalog';
import type { CatalogInfo } from '../../lib/catalog';
import { errorMessage } from '../../lib/errors';

export type CatalogListEntry = CatalogInfo | { id: string; error: string };

export class CatalogController {
  constructor(private readonly loader: CatalogLoader = new CatalogLoader()) {}

  /**
   * GET /api/catalogs
   * Invalid catalogs are listed with their validation error
   */
  listCatalogs = asyncHandler(async (_req: Request, res: Response) => {
    const names = await this.loader.listCatalogs();
    const catalogs: CatalogListEntry[] = [];

    for (const name of names) {
      try {
        catalogs.push(await this.loader.getCatalogInfo(name));
      } catch (error) {
        console.warn(`[Catalog] Skipping invalid catalog ${name}: ${errorMessage(error)}`);
        catalogs.push({ id: name, error: errorMessage(error) });
      }
    }

    res.json({ success: true, catalogs });
  });
}
