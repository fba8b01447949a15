/**
 * Assessment Router
 * Route definitions for assessment endpoints
 */

import { Router } from 'express';
import { assessmentController, AssessmentController } from './assessment.controller';

export const createAssessmentRouter = (controller: AssessmentController = assessmentController): Router => {
  const router = Router();

  /**
   * @route   POST /api/assessments
   * @desc    Create and start an assessment
   */
  router.post('/', controller.createJob);

  /**
   * @route   GET /api/assessments
   * @desc    List assessments, optionally filtered by ?status=
   */
  router.get('/', controller.getJobs);

  /**
   * @route   GET /api/assessments/:id
   * @desc    Get an assessment with its per-organization outcomes
   */
  router.get('/:id', controller.getJob);

  /**
   * @route   POST /api/assessments/:id/cancel
   * @desc    Cancel a queued or running assessment
   */
  router.post('/:id/cancel', controller.cancelJob);

  /**
   * @route   GET /api/assessments/:id/results.csv
   * @desc    Download criterion results as CSV
   */
  router.get('/:id/results.csv', controller.getResultsCsv);

  /**
   * @route   GET /api/assessments/:id/statistics
   * @desc    Statistics report as json, markdown or csv
   */
  router.get('/:id/statistics', controller.getStatistics);

  return router;
};
