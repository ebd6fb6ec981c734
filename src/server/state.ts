/**
 * MCP Server State Management
 *
 * Holds the configuration and the job scheduler shared by all tools.
 *
 * @module server/state
 */

import { ServerConfigSchema, type ServerConfig } from './config.js';
import { JobRegistry } from '../services/jobs/job-registry.js';
import { ProcessingScheduler } from '../services/jobs/scheduler.js';
import { ReportProcessor } from '../services/processing/processor.js';
import type { ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

function defaultConfig(): ServerConfig {
  return ServerConfigSchema.parse({});
}

export const state: ServerState = {
  config: defaultConfig(),
  scheduler: null,
  startedAt: Date.now(),
};

/**
 * Install configuration. Drops any scheduler built from the previous one.
 */
export function initializeState(config: ServerConfig): void {
  state.config = { ...config };
  state.scheduler = null;
  state.startedAt = Date.now();
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): ServerConfig {
  return { ...state.config };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEDULER ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Scheduler for the current configuration, created on first use
 */
export function requireScheduler(): ProcessingScheduler {
  if (!state.scheduler) {
    const { jobTtlMs, maxJobs, maxConcurrent } = state.config;
    state.scheduler = new ProcessingScheduler({
      registry: new JobRegistry({ ttlMs: jobTtlMs, maxJobs }),
      processor: new ReportProcessor({ maxConcurrent }),
    });
  }
  return state.scheduler;
}

/**
 * Replace the scheduler, e.g. with one that uses an in-process PDF reader
 */
export function setScheduler(scheduler: ProcessingScheduler): void {
  state.scheduler = scheduler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  initializeState(defaultConfig());
}
