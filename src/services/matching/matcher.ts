/**
 * Document Matcher
 *
 * Associates a PDF filename with the one report it describes by running
 * the matching passes in priority order. The first pass that accepts a
 * report wins; within a pass the first report in input order wins.
 *
 * Pure: the report collection is never copied or mutated.
 *
 * @module services/matching/matcher
 */

import type { ReportRecord } from '../../models/report.js';
import type { MatchResult } from '../../models/match.js';
import { MATCH_PASSES, type MatchPass } from './passes.js';

/**
 * Match a PDF filename against the reports.
 *
 * @param filename - Base filename of the PDF (not a path)
 * @param reports - Report collection, read-only for the whole run
 * @param passes - Pass list, defaults to all five in priority order
 * @returns The matched report with its index and pass, or null
 */
export function matchReport(
  filename: string,
  reports: readonly ReportRecord[],
  passes: readonly MatchPass[] = MATCH_PASSES
): MatchResult {
  if (reports.length === 0) return null;

  for (const pass of passes) {
    const index = pass.find(filename, reports);
    if (index !== null) {
      return { report: reports[index], index, pass: pass.pass, passName: pass.name };
    }
  }

  return null;
}
