/**
 * Processing Scheduler
 *
 * Runs report processing jobs in the background and reflects their
 * progress and outcome in the job registry.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/jobs/scheduler
 */

import { v4 as uuidv4 } from 'uuid';
import { resolveJobFolder } from '../processing/folders.js';
import type { ReportProcessor } from '../processing/processor.js';
import { JobNotFoundError } from './errors.js';
import type { JobRecord, JobRegistry } from './job-registry.js';

export interface SchedulerConfig {
  registry: JobRegistry;
  processor: ReportProcessor;
  /** Job ID factory (default: uuid v4) */
  generateId?: () => string;
}

export class ProcessingScheduler {
  readonly registry: JobRegistry;
  private readonly processor: ReportProcessor;
  private readonly generateId: () => string;
  private running = new Map<string, Promise<void>>();

  constructor(config: SchedulerConfig) {
    this.registry = config.registry;
    this.processor = config.processor;
    this.generateId = config.generateId ?? uuidv4;
  }

  /**
   * Validate a job folder and start processing it in the background.
   *
   * @throws ProcessingError when the folder or its source JSON is missing
   * @throws JobCapacityError when the registry is full of running jobs
   */
  submit(folderPath: string): JobRecord {
    const paths = resolveJobFolder(folderPath);
    const job = this.registry.create(this.generateId(), paths.folderPath);

    console.error(`[INFO] Job ${job.id} queued for ${paths.folderPath}`);

    const run = this.run(job.id, paths).finally(() => {
      this.running.delete(job.id);
    });
    this.running.set(job.id, run);
    return job;
  }

  get(jobId: string): JobRecord | null {
    return this.registry.get(jobId);
  }

  /**
   * Resolve with the job record once the job has settled
   *
   * @throws JobNotFoundError for unknown or expired jobs
   */
  async waitFor(jobId: string): Promise<JobRecord> {
    const run = this.running.get(jobId);
    if (run) {
      await run;
    }
    const job = this.registry.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  /** Number of jobs not yet settled */
  get activeCount(): number {
    return this.running.size;
  }

  private async run(
    jobId: string,
    paths: ReturnType<typeof resolveJobFolder>
  ): Promise<void> {
    try {
      this.registry.start(jobId);
      const summary = await this.processor.process({
        sourceJsonPath: paths.sourceJsonPath,
        pdfDirectory: paths.pdfDirectory,
        outputJsonPath: paths.outputJsonPath,
        onProgress: (percent, message) => {
          this.registry.advance(jobId, percent, message);
        },
      });
      this.registry.complete(jobId, summary);
      console.error(`[INFO] Job ${jobId} completed: ${summary.total_articles} articles`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] Job ${jobId} failed: ${message}`);
      this.registry.fail(jobId, message);
    }
  }
}
