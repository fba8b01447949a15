/**
 * Catalog Router
 */

import { Router } from 'express';
import { CatalogController } from './catalog.controller';

export const createCatalogRouter = (controller: CatalogController = new CatalogController()): Router => {
  const router = Router();

  /**
   * @route   GET /api/catalogs
   * @desc    List criteria catalogs with their metadata
   */
  router.get('/', controller.listCatalogs);

  return router;
};
