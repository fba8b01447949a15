/**
 * Assessment Repository
 * In-memory store for assessment jobs
 */

import { randomUUID } from 'crypto';
import { AssessmentStatus, IAssessmentJob } from './assessment.types';

export type NewAssessmentJob = Omit<IAssessmentJob, 'id' | 'createdAt' | 'outcomes' | 'statistics' | 'progressMessage'>;

export class AssessmentRepository {
  private readonly jobs = new Map<string, IAssessmentJob>();

  /**
   * Create a new assessment job
   */
  async create(data: NewAssessmentJob): Promise<IAssessmentJob> {
    const job: IAssessmentJob = {
      ...data,
      id: randomUUID(),
      outcomes: [],
      statistics: null,
      progressMessage: '',
      createdAt: new Date(),
    };
    this.jobs.set(job.id, job);
    return job;
  }

  /**
   * Find job by ID
   */
  async findById(id: string): Promise<IAssessmentJob | null> {
    return this.jobs.get(id) ?? null;
  }

  /**
   * All jobs, newest first
   */
  async findAll(options: { status?: AssessmentStatus } = {}): Promise<IAssessmentJob[]> {
    return [...this.jobs.values()]
      .filter((job) => !options.status || job.status === options.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async update(id: string, patch: Partial<Omit<IAssessmentJob, 'id'>>): Promise<IAssessmentJob | null> {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }
    Object.assign(job, patch);
    return job;
  }

  /**
   * Update job status and lifecycle timestamps
   */
  async updateStatus(
    id: string,
    status: AssessmentStatus,
    metadata: Partial<Omit<IAssessmentJob, 'id' | 'status'>> = {}
  ): Promise<IAssessmentJob | null> {
    const update: Partial<Omit<IAssessmentJob, 'id'>> = { ...metadata, status };

    if (status === AssessmentStatus.RUNNING) {
      update.startedAt = new Date();
    } else if (status !== AssessmentStatus.QUEUED) {
      update.completedAt = new Date();
    }

    return this.update(id, update);
  }

  async clear(): Promise<void> {
    this.jobs.clear();
  }
}

export const assessmentRepository = new AssessmentRepository();
