/**
 * Job Error Classes
 */

export type JobErrorCategory = 'JOB_NOT_FOUND' | 'JOB_INVALID_TRANSITION' | 'JOB_CAPACITY_EXCEEDED';

export class JobError extends Error {
  constructor(
    message: string,
    public readonly category: JobErrorCategory,
    public readonly jobId?: string
  ) {
    super(message);
    this.name = 'JobError';
  }
}

export class JobNotFoundError extends JobError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, 'JOB_NOT_FOUND', jobId);
    this.name = 'JobNotFoundError';
  }
}

export class JobStateError extends JobError {
  constructor(jobId: string, from: string, to: string) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`, 'JOB_INVALID_TRANSITION', jobId);
    this.name = 'JobStateError';
  }
}

export class JobCapacityError extends JobError {
  constructor(maxJobs: number) {
    super(
      `Job registry is full (${maxJobs} jobs) and no finished job can be evicted`,
      'JOB_CAPACITY_EXCEEDED'
    );
    this.name = 'JobCapacityError';
  }
}
