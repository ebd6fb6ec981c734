/**
 * Health Check MCP Tool
 *
 * Tools: report_health
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { getConfig, requireScheduler, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

const HealthInput = z.object({});

async function handleHealth(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(HealthInput, params);
    const config = getConfig();
    const scheduler = requireScheduler();
    const dataDir = path.resolve(config.dataDir);

    return formatResponse(
      successResult({
        status: 'online',
        uptime_ms: Date.now() - state.startedAt,
        data_dir: dataDir,
        data_dir_exists: fs.existsSync(dataDir),
        jobs: {
          ...scheduler.registry.counts(),
          active: scheduler.activeCount,
        },
        config: {
          max_concurrent: config.maxConcurrent,
          job_ttl_ms: config.jobTtlMs,
          max_jobs: config.maxJobs,
        },
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const healthTools: Record<string, ToolDefinition> = {
  report_health: {
    description: 'Server status, job counts per status and effective configuration.',
    inputSchema: HealthInput.shape,
    handler: handleHealth,
  },
};
