/**
 * Job Registry - status records for background processing jobs
 *
 * Jobs move queued -> processing -> completed | failed, and only through
 * the transition methods below. Finished jobs expire after a TTL and are
 * evicted oldest-first when the registry is full; running jobs never are.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/jobs/job-registry
 */

import { JobCapacityError, JobNotFoundError, JobStateError } from './errors.js';
import type { ProcessingSummary } from '../processing/processor.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface JobRecord {
  id: string;
  folder_path: string;
  status: JobStatus;
  /** 0-100, never decreases */
  progress: number;
  message: string;
  created_at: string;
  updated_at: string;
  finished_at: string | null;
  result: ProcessingSummary | null;
  error: string | null;
}

export interface JobRegistryConfig {
  /** How long a finished job stays queryable */
  ttlMs: number;
  maxJobs: number;
  /** Clock, in epoch milliseconds */
  now?: () => number;
}

interface StoredJob {
  record: JobRecord;
  createdMs: number;
  finishedMs: number | null;
}

function isFinished(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}

function clampProgress(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, Math.floor(value)));
}

// ═══════════════════════════════════════════════════════════════════════════════
// JOB REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export class JobRegistry {
  private jobs = new Map<string, StoredJob>();
  private readonly ttlMs: number;
  private readonly maxJobs: number;
  private readonly now: () => number;

  constructor(config: JobRegistryConfig) {
    this.ttlMs = config.ttlMs;
    this.maxJobs = config.maxJobs;
    this.now = config.now ?? Date.now;
  }

  /**
   * Register a new queued job.
   *
   * @throws JobCapacityError when full and every job is still running
   */
  create(id: string, folderPath: string): JobRecord {
    this.cleanupExpired();
    if (this.jobs.size >= this.maxJobs) {
      this.evictOldestFinished();
    }

    const nowMs = this.now();
    const timestamp = new Date(nowMs).toISOString();
    const record: JobRecord = {
      id,
      folder_path: folderPath,
      status: 'queued',
      progress: 0,
      message: 'Queued',
      created_at: timestamp,
      updated_at: timestamp,
      finished_at: null,
      result: null,
      error: null,
    };
    this.jobs.set(id, { record, createdMs: nowMs, finishedMs: null });
    return { ...record };
  }

  start(id: string): JobRecord {
    const job = this.transition(id, ['queued'], 'processing');
    job.record.message = 'Starting PDF text extraction...';
    return { ...job.record };
  }

  /**
   * Record progress of a running job. Lower values than the current
   * progress are ignored; the message is always updated.
   */
  advance(id: string, progress: number, message: string): JobRecord {
    const job = this.require(id);
    if (job.record.status !== 'processing') {
      throw new JobStateError(id, job.record.status, 'processing');
    }
    job.record.progress = Math.max(job.record.progress, clampProgress(progress));
    job.record.message = message;
    job.record.updated_at = new Date(this.now()).toISOString();
    return { ...job.record };
  }

  complete(id: string, result: ProcessingSummary): JobRecord {
    const job = this.transition(id, ['processing'], 'completed');
    job.record.progress = 100;
    job.record.message = 'PDF processing complete!';
    job.record.result = result;
    return { ...job.record };
  }

  fail(id: string, error: string): JobRecord {
    const job = this.transition(id, ['queued', 'processing'], 'failed');
    job.record.message = `Error: ${error}`;
    job.record.error = error;
    return { ...job.record };
  }

  get(id: string): JobRecord | null {
    const job = this.jobs.get(id);
    return job ? { ...job.record } : null;
  }

  list(): JobRecord[] {
    return Array.from(this.jobs.values(), (job) => ({ ...job.record }));
  }

  /** Job counts per status */
  counts(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = { queued: 0, processing: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      counts[job.record.status]++;
    }
    return counts;
  }

  /** Remove finished jobs older than the TTL */
  cleanupExpired(): number {
    const nowMs = this.now();
    let cleaned = 0;
    for (const [id, job] of this.jobs) {
      if (job.finishedMs !== null && nowMs - job.finishedMs > this.ttlMs) {
        this.jobs.delete(id);
        cleaned++;
      }
    }
    return cleaned;
  }

  private require(id: string): StoredJob {
    const job = this.jobs.get(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  private transition(id: string, from: readonly JobStatus[], to: JobStatus): StoredJob {
    const job = this.require(id);
    if (!from.includes(job.record.status)) {
      throw new JobStateError(id, job.record.status, to);
    }

    const nowMs = this.now();
    job.record.status = to;
    job.record.updated_at = new Date(nowMs).toISOString();
    if (isFinished(to)) {
      job.finishedMs = nowMs;
      job.record.finished_at = job.record.updated_at;
    }
    return job;
  }

  private evictOldestFinished(): void {
    let oldest: StoredJob | null = null;
    for (const job of this.jobs.values()) {
      if (job.finishedMs === null) continue;
      if (oldest === null || job.createdMs < oldest.createdMs) {
        oldest = job;
      }
    }
    if (oldest === null) {
      throw new JobCapacityError(this.maxJobs);
    }
    this.jobs.delete(oldest.record.id);
    console.error(`[INFO] Evicted finished job ${oldest.record.id} (registry at capacity)`);
  }
}
