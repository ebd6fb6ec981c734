/**
 * Tests for the Health Check MCP Tool
 *
 * @module tests/unit/tools/health
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import { healthTools } from '../../../src/tools/health.js';
import { initializeState, resetState } from '../../../src/server/state.js';

describe('report_health', () => {
  let base: string;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'test-tools-'));
    resetState();
  });

  afterEach(() => {
    resetState();
    rmSync(base, { recursive: true, force: true });
  });

  it('should report status, job counts and effective config', async () => {
    initializeState({ dataDir: base, maxConcurrent: 3, jobTtlMs: 1000, maxJobs: 5 });

    const result = await healthTools.report_health.handler({});
    const data = JSON.parse(result.content[0].text);

    expect(data.success).toBe(true);
    expect(data.data.status).toBe('online');
    expect(data.data.uptime_ms).toBeGreaterThanOrEqual(0);
    expect(data.data.data_dir).toBe(resolve(base));
    expect(data.data.data_dir_exists).toBe(true);
    expect(data.data.jobs).toEqual({ queued: 0, processing: 0, completed: 0, failed: 0, active: 0 });
    expect(data.data.config).toEqual({ max_concurrent: 3, job_ttl_ms: 1000, max_jobs: 5 });
  });

  it('should flag a missing data directory', async () => {
    initializeState({ dataDir: join(base, 'missing'), maxConcurrent: 2, jobTtlMs: 1000, maxJobs: 5 });

    const data = JSON.parse((await healthTools.report_health.handler({})).content[0].text);
    expect(data.data.data_dir_exists).toBe(false);
  });
});
