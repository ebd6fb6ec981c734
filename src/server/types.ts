/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { ProcessingScheduler } from '../services/jobs/scheduler.js';
import type { ServerConfig } from './config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Server configuration */
  config: ServerConfig;

  /** Job scheduler, built from config on first use */
  scheduler: ProcessingScheduler | null;

  /** Epoch ms when the state was initialized */
  startedAt: number;
}
