/**
 * Assessment Controller
 * HTTP request/response handling for assessment endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { isReportFormat } from '../../lib/statistics';
import { assessmentService, AssessmentService, toAssessmentView } from './assessment.service';
import { createAssessmentSchema } from './assessment.schemas';
import { AssessmentStatus, IAssessmentListResponse, IAssessmentResponse } from './assessment.types';

const REPORT_CONTENT_TYPES = {
  json: 'application/json',
  markdown: 'text/markdown',
  csv: 'text/csv',
} as const;

function isAssessmentStatus(value: unknown): value is AssessmentStatus {
  return Object.values(AssessmentStatus).some((status) => status === value);
}

export class AssessmentController {
  constructor(private readonly service: AssessmentService = assessmentService) {}

  /**
   * POST /api/assessments
   * Create and start a new assessment
   */
  createJob = asyncHandler(async (req: Request, res: Response) => {
    const parsed = createAssessmentSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ApiError(400, issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
    }

    const job = await this.service.createJob(parsed.data);

    const response: IAssessmentResponse = {
      success: true,
      assessment: toAssessmentView(job),
    };

    res.status(201).json(response);
  });

  /**
   * GET /api/assessments
   */
  getJobs = asyncHandler(async (req: Request, res: Response) => {
    const { status } = req.query;
    if (status !== undefined && !isAssessmentStatus(status)) {
      throw new ApiError(400, `Invalid status filter: ${String(status)}`);
    }

    const jobs = await this.service.getJobs(status);

    const response: IAssessmentListResponse = {
      success: true,
      assessments: jobs.map(toAssessmentView),
      total: jobs.length,
    };

    res.json(response);
  });

  /**
   * GET /api/assessments/:id
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const job = await this.service.getJob(req.params.id);

    const response: IAssessmentResponse = {
      success: true,
      assessment: toAssessmentView(job),
    };

    res.json(response);
  });

  /**
   * POST /api/assessments/:id/cancel
   */
  cancelJob = asyncHandler(async (req: Request, res: Response) => {
    const job = await this.service.cancelJob(req.params.id);

    const response: IAssessmentResponse = {
      success: true,
      assessment: toAssessmentView(job),
    };

    res.json(response);
  });

  /**
   * GET /api/assessments/:id/results.csv
   */
  getResultsCsv = asyncHandler(async (req: Request, res: Response) => {
    const csv = await this.service.getResultsCsv(req.params.id);

    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="assessment-${req.params.id}.csv"`);
    res.send(csv);
  });

  /**
   * GET /api/assessments/:id/statistics?format=json|markdown|csv
   */
  getStatistics = asyncHandler(async (req: Request, res: Response) => {
    const format = req.query.format ?? 'json';
    if (!isReportFormat(format)) {
      throw new ApiError(400, `Unsupported statistics format: ${String(format)}`);
    }

    if (format === 'json') {
      res.json({ success: true, statistics: await this.service.getStatistics(req.params.id) });
      return;
    }

    const report = await this.service.getStatisticsReport(req.params.id, format);
    res.setHeader('Content-Type', `${REPORT_CONTENT_TYPES[format]}; charset=utf-8`);
    res.send(report);
  });
}

export const assessmentController = new AssessmentController();
