/**
 * Server Configuration
 *
 * Environment variables:
 *   REPORT_MERGE_DATA_DIR        Directory holding job folders (default: ./reliefweb_data)
 *   REPORT_MERGE_MAX_CONCURRENT  PDFs extracted in parallel, 1-16 (default: 2)
 *   REPORT_MERGE_JOB_TTL_MS      How long finished jobs stay queryable (default: 1 hour)
 *   REPORT_MERGE_MAX_JOBS        Registry capacity (default: 100)
 *
 * @module server/config
 */

import { z } from 'zod';

export const DEFAULT_DATA_DIR = './reliefweb_data';

export const ServerConfigSchema = z.object({
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  maxConcurrent: z.number().int().min(1).max(16).default(2),
  jobTtlMs: z.number().int().positive().default(60 * 60 * 1000),
  maxJobs: z.number().int().min(1).default(100),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Load configuration from environment variables, with overrides taking precedence.
 *
 * @throws Error when a numeric env var is malformed, ZodError when a value is out of range
 */
export function loadServerConfig(overrides?: Partial<ServerConfig>): ServerConfig {
  const envConfig = {
    dataDir: process.env.REPORT_MERGE_DATA_DIR || DEFAULT_DATA_DIR,
    maxConcurrent: parseIntEnv('REPORT_MERGE_MAX_CONCURRENT', 2),
    jobTtlMs: parseIntEnv('REPORT_MERGE_JOB_TTL_MS', 60 * 60 * 1000),
    maxJobs: parseIntEnv('REPORT_MERGE_MAX_JOBS', 100),
  };

  return ServerConfigSchema.parse({ ...envConfig, ...overrides });
}
