/**
 * Shared Startup
 *
 * Loads the .env file and the environment-driven configuration.
 * Used by both src/index.ts (MCP stdio) and src/cli.ts.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadServerConfig, type ServerConfig } from './config.js';
import { initializeState } from './state.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Load .env from the first candidate that exists:
 * 1. REPORT_MERGE_ENV_FILE env var (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env, from src/server or dist/src/server
 *
 * @returns The loaded path, or null when none exists
 */
export function loadEnvFile(): string | null {
  const envCandidates = [
    process.env.REPORT_MERGE_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '..', '..', '.env'),
    path.resolve(__dirname, '..', '..', '..', '.env'),
  ].filter((p): p is string => typeof p === 'string' && p !== '');

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return envPath;
    }
  }
  return null;
}

/**
 * Load configuration from the environment and install it as server state.
 * Warnings only: a missing data directory does not stop the server.
 */
export function applyStartupConfig(overrides?: Partial<ServerConfig>): ServerConfig {
  const config = loadServerConfig(overrides);
  initializeState(config);

  if (!fs.existsSync(config.dataDir)) {
    console.error(
      `[WARN] Data directory ${path.resolve(config.dataDir)} does not exist. ` +
        'Set REPORT_MERGE_DATA_DIR or pass base_dir to report_folders.'
    );
  }
  console.error(
    `[Config] dataDir=${config.dataDir} maxConcurrent=${config.maxConcurrent} ` +
      `jobTtlMs=${config.jobTtlMs} maxJobs=${config.maxJobs}`
  );
  return config;
}
