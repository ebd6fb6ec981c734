/**
 * Report Merge MCP Tools
 *
 * Tools: report_folders, report_process, report_process_status, report_match
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/reports
 */

import path from 'path';
import { getConfig, requireScheduler } from '../server/state.js';
import { jobNotFoundError } from '../server/errors.js';
import { successResult } from '../server/types.js';
import {
  FolderListInput,
  MatchInput,
  ProcessStartInput,
  ProcessStatusInput,
  validateInput,
} from '../utils/validation.js';
import { listDataFolders, resolveJobFolder } from '../services/processing/folders.js';
import { loadSourceDocument } from '../services/processing/processor.js';
import { matchReport } from '../services/matching/matcher.js';
import { getReliefwebId, getSavedFilenames, getTitle } from '../models/report.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: report_folders
// ═══════════════════════════════════════════════════════════════════════════════

async function handleFolders(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(FolderListInput, params);
    const baseDir = input.base_dir ?? getConfig().dataDir;
    const folders = listDataFolders(baseDir);

    return formatResponse(
      successResult({
        base_dir: path.resolve(baseDir),
        total: folders.length,
        folders,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: report_process
// ═══════════════════════════════════════════════════════════════════════════════

async function handleProcess(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProcessStartInput, params);
    const job = requireScheduler().submit(input.folder_path);

    return formatResponse(
      successResult({
        job_id: job.id,
        status: job.status,
        folder_path: job.folder_path,
        next_steps: [{ tool: 'report_process_status', description: 'Poll progress with this job_id' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: report_process_status
// ═══════════════════════════════════════════════════════════════════════════════

async function handleProcessStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProcessStatusInput, params);
    const scheduler = requireScheduler();
    scheduler.registry.cleanupExpired();

    const job = scheduler.get(input.job_id);
    if (!job) {
      throw jobNotFoundError(input.job_id);
    }
    return formatResponse(successResult(job));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: report_match
// ═══════════════════════════════════════════════════════════════════════════════

async function handleMatch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(MatchInput, params);
    const paths = resolveJobFolder(input.folder_path);
    const source = await loadSourceDocument(paths.sourceJsonPath);
    const match = matchReport(input.pdf_filename, source.reports);

    if (!match) {
      return formatResponse(
        successResult({
          pdf_filename: input.pdf_filename,
          matched: false,
          total_reports: source.reports.length,
        })
      );
    }

    return formatResponse(
      successResult({
        pdf_filename: input.pdf_filename,
        matched: true,
        pass: match.pass,
        pass_name: match.passName,
        report_index: match.index,
        report: {
          title: getTitle(match.report),
          reliefweb_id: getReliefwebId(match.report),
          saved_filenames: getSavedFilenames(match.report),
        },
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const reportTools: Record<string, ToolDefinition> = {
  report_folders: {
    description:
      'List job folders under the data directory with PDF counts, source JSON and whether a merged full-text file already exists.',
    inputSchema: FolderListInput.shape,
    handler: handleFolders,
  },
  report_process: {
    description:
      'Start merging a job folder: extract text from every PDF, match each to its report and write <base>_reports_full_text.json. Returns a job_id.',
    inputSchema: ProcessStartInput.shape,
    handler: handleProcess,
  },
  report_process_status: {
    description: 'Get status, progress (0-100) and result summary of a processing job.',
    inputSchema: ProcessStatusInput.shape,
    handler: handleProcessStatus,
  },
  report_match: {
    description:
      "Dry-run the matcher: show which report a PDF filename would be linked to and by which pass, using the folder's source JSON.",
    inputSchema: MatchInput.shape,
    handler: handleMatch,
  },
};
