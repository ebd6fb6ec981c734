/**
 * Filename helpers for report matching
 *
 * @module services/matching/filename
 */

const PDF_SUFFIX = '.pdf';

/** Labels at or below this length never take part in title containment */
export const MIN_TITLE_LABEL_LENGTH = 10;

/**
 * Remove every occurrence of '.pdf' (case-sensitive), not only a trailing one
 */
export function stripPdf(name: string): string {
  return name.split(PDF_SUFFIX).join('');
}

/**
 * Underscore-delimited segments of the filename with '.pdf' removed
 */
export function filenameSegments(filename: string): string[] {
  return stripPdf(filename).split('_');
}

/**
 * Identifier prefix: first two segments joined by '_', null with fewer than two
 */
export function identifierPrefix(filename: string): string | null {
  const segments = filenameSegments(filename);
  if (segments.length < 2) return null;
  return `${segments[0]}_${segments[1]}`;
}

/**
 * Candidate ReliefWeb identifier: the first segment
 */
export function candidateIdentifier(filename: string): string {
  return filenameSegments(filename)[0];
}

/**
 * Lower-case and drop every character outside [a-z0-9]
 */
export function normalizeLabel(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, '');
}

/**
 * Title label of a filename, normalized: segments from the third onward
 * when there are at least three, otherwise the whole stripped name.
 */
export function titleLabel(filename: string): string {
  const segments = filenameSegments(filename);
  const label = segments.length >= 3 ? segments.slice(2).join('_') : stripPdf(filename);
  return normalizeLabel(label);
}
