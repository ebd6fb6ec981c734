/**
 * Matching passes
 *
 * Each pass is a pure strategy: given a PDF filename and the report
 * collection, return the index of the first report it accepts, or null.
 * Passes are listed in priority order; the matcher runs them in sequence.
 *
 * @module services/matching/passes
 */

import {
  getReliefwebId,
  getSavedFilenames,
  getTitle,
  type ReportRecord,
} from '../../models/report.js';
import type { MatchPassName, MatchPassNumber } from '../../models/match.js';
import {
  MIN_TITLE_LABEL_LENGTH,
  candidateIdentifier,
  identifierPrefix,
  normalizeLabel,
  stripPdf,
  titleLabel,
} from './filename.js';

export interface MatchPass {
  pass: MatchPassNumber;
  name: MatchPassName;
  find(filename: string, reports: readonly ReportRecord[]): number | null;
}

/**
 * First index whose report has a stored filename accepted by `accept`
 */
function findBySavedFilename(
  reports: readonly ReportRecord[],
  accept: (saved: string) => boolean
): number | null {
  const idx = reports.findIndex((report) => getSavedFilenames(report).some(accept));
  return idx === -1 ? null : idx;
}

export const exactFilenamePass: MatchPass = {
  pass: 1,
  name: 'exact_filename',
  find(filename, reports) {
    const target = filename.toLowerCase();
    return findBySavedFilename(reports, (saved) => saved.toLowerCase() === target);
  },
};

export const filenameWithoutExtensionPass: MatchPass = {
  pass: 2,
  name: 'filename_without_extension',
  find(filename, reports) {
    const target = stripPdf(filename.toLowerCase());
    return findBySavedFilename(reports, (saved) => stripPdf(saved).toLowerCase() === target);
  },
};

export const identifierPrefixPass: MatchPass = {
  pass: 3,
  name: 'identifier_prefix',
  find(filename, reports) {
    const prefix = identifierPrefix(filename);
    if (prefix === null) return null;
    const target = prefix.toLowerCase();
    return findBySavedFilename(reports, (saved) => saved.toLowerCase().startsWith(target));
  },
};

export const reliefwebIdPass: MatchPass = {
  pass: 4,
  name: 'reliefweb_id',
  find(filename, reports) {
    const candidate = candidateIdentifier(filename);
    const idx = reports.findIndex((report) => {
      const id = getReliefwebId(report);
      return id !== '' && id === candidate;
    });
    return idx === -1 ? null : idx;
  },
};

export const titleContainmentPass: MatchPass = {
  pass: 5,
  name: 'title_containment',
  find(filename, reports) {
    const label = titleLabel(filename);
    if (label.length <= MIN_TITLE_LABEL_LENGTH) return null;

    const idx = reports.findIndex((report) => {
      const title = getTitle(report);
      if (title === null) return false;
      const normalized = normalizeLabel(title);
      return normalized.includes(label) || label.includes(normalized);
    });
    return idx === -1 ? null : idx;
  },
};

/**
 * All passes in priority order
 */
export const MATCH_PASSES: readonly MatchPass[] = [
  exactFilenamePass,
  filenameWithoutExtensionPass,
  identifierPrefixPass,
  reliefwebIdPass,
  titleContainmentPass,
];
