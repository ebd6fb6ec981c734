/**
 * Report (metadata record) model for PDF Report Merge
 *
 * Reports arrive as loosely shaped JSON. Every accessor here narrows a
 * single field and returns an empty value when the field is missing or
 * malformed, so matching passes can skip incomplete records silently.
 */

/**
 * One metadata record as read from the source JSON.
 * Fields are read through the accessors below, never directly.
 */
export type ReportRecord = Readonly<Record<string, unknown>>;

/**
 * Entry of a `files` list on a report
 */
export interface FileDescriptor {
  saved_filename?: unknown;
  filename?: unknown;
  [key: string]: unknown;
}

/**
 * Report date with all three sub-fields always present
 */
export interface ReportDate {
  created: string;
  changed: string;
  original: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * File descriptors of a report. Non-object entries are dropped.
 */
export function getFileDescriptors(report: ReportRecord): FileDescriptor[] {
  const files = report.files;
  if (!Array.isArray(files)) return [];
  return files.filter(isRecord);
}

/**
 * Stored filename of a descriptor: `saved_filename` when it is a non-empty
 * string, otherwise `filename`, otherwise ''.
 */
export function getSavedFilename(descriptor: FileDescriptor): string {
  const saved = descriptor.saved_filename;
  if (typeof saved === 'string' && saved !== '') return saved;
  const filename = descriptor.filename;
  return typeof filename === 'string' ? filename : '';
}

/**
 * Non-empty stored filenames of all descriptors, in descriptor order
 */
export function getSavedFilenames(report: ReportRecord): string[] {
  return getFileDescriptors(report)
    .map(getSavedFilename)
    .filter((name) => name !== '');
}

/**
 * ReliefWeb identifier as a string ('' when absent)
 */
export function getReliefwebId(report: ReportRecord): string {
  const id = report.reliefweb_id;
  if (typeof id === 'string') return id;
  if (typeof id === 'number' && Number.isFinite(id)) return String(id);
  return '';
}

/**
 * Title when it is a string, otherwise null
 */
export function getTitle(report: ReportRecord): string | null {
  return typeof report.title === 'string' ? report.title : null;
}

/**
 * Read a string field from an arbitrary value, '' when not a string
 */
export function readString(container: unknown, key: string): string {
  if (!isRecord(container)) return '';
  const value = container[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Read a nested object field, null when absent or not an object
 */
export function readObject(container: unknown, key: string): Record<string, unknown> | null {
  if (!isRecord(container)) return null;
  const value = container[key];
  return isRecord(value) ? value : null;
}
