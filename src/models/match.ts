/**
 * Match result interfaces
 */

import type { ReportRecord } from './report.js';

/**
 * Matching pass numbers, in priority order
 */
export type MatchPassNumber = 1 | 2 | 3 | 4 | 5;

export type MatchPassName =
  | 'exact_filename'
  | 'filename_without_extension'
  | 'identifier_prefix'
  | 'reliefweb_id'
  | 'title_containment';

/**
 * A successful match. `index` is the report's position in the input
 * collection and serves as its surrogate key.
 */
export interface ReportMatch {
  report: ReportRecord;
  index: number;
  pass: MatchPassNumber;
  passName: MatchPassName;
}

/**
 * Match outcome: a match, or null when no pass hit
 */
export type MatchResult = ReportMatch | null;
