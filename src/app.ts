/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { CatalogLoader } from './lib/catalog';
import { AssessmentController } from './modules/assessment/assessment.controller';
import { assessmentService, AssessmentService } from './modules/assessment/assessment.service';
import { createAssessmentRouter } from './modules/assessment/assessment.router';
import { CatalogController } from './modules/catalog/catalog.controller';
import { createCatalogRouter } from './modules/catalog/catalog.router';

export interface AppServices {
  assessmentService?: AssessmentService;
  catalogLoader?: CatalogLoader;
}

export const createApp = (services: AppServices = {}): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(express.json({ limit: '5mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Openness Crawler API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
    });
  });

  app.use('/api/catalogs', createCatalogRouter(new CatalogController(services.catalogLoader)));
  app.use(
    '/api/assessments',
    createAssessmentRouter(new AssessmentController(services.assessmentService ?? assessmentService))
  );

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
