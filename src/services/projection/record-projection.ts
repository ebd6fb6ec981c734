/**
 * Record Projection
 *
 * Flattens a report's heterogeneous field shapes into the article shape
 * used for output. The same rules apply to matched and unmatched reports.
 *
 * @module services/projection/record-projection
 */

import { isRecord, readObject, readString, type ReportRecord } from '../../models/report.js';
import type { ProjectedReport } from '../../models/article.js';

/**
 * Project a list of names.
 *
 * A non-empty list whose first element is an object is read as named
 * entries (missing names become ''). Any other list is kept with its
 * elements as strings. Anything else is an empty list.
 */
export function projectNameList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  if (value.length > 0 && isRecord(value[0])) {
    return value.map((entry) => readString(entry, 'name'));
  }
  return value.map((entry) => (typeof entry === 'string' ? entry : String(entry)));
}

/**
 * Language: a named entry's name, the string form of any other value, '' when absent
 */
export function projectLanguage(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (isRecord(value)) return readString(value, 'name');
  return typeof value === 'string' ? value : String(value);
}

export function emptyProjection(): ProjectedReport {
  return {
    title: '',
    date: { created: '', changed: '', original: '' },
    url: '',
    sources: [],
    countries: [],
    disasters: [],
    language: '',
    body_text: '',
  };
}

/**
 * Project a report into flat article fields.
 *
 * Pure: the same report always yields an equal projection.
 */
export function projectReport(report: ReportRecord): ProjectedReport {
  const date = readObject(report, 'date');
  const url = readString(report, 'url') || readString(report, 'url_alias');

  const bodyText =
    typeof report.body_text === 'string'
      ? report.body_text
      : readString(readObject(report, 'content'), 'body_text');

  return {
    title: readString(report, 'title'),
    date: {
      created: readString(date, 'created'),
      changed: readString(date, 'changed'),
      original: readString(date, 'original'),
    },
    url,
    sources: projectNameList('sources' in report ? report.sources : report.source),
    countries: projectNameList(report.countries),
    disasters: projectNameList(report.disasters),
    language: projectLanguage(report.language),
    body_text: bodyText,
  };
}
