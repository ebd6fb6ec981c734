/**
 * PDF Report Merge - library entry point
 *
 * @module lib
 */

export { filterPage, isCaptionLine, isAttributionLine } from './services/extraction/page-filter.js';
export { extractDocument, assembleDocumentText } from './services/extraction/document-extractor.js';
export { detectTables } from './services/extraction/table-detector.js';
export { PdfjsReader, type PdfReader } from './services/extraction/pdf-reader.js';
export { ExtractionError, PdfOpenError } from './services/extraction/errors.js';

export { matchReport } from './services/matching/matcher.js';
export { MATCH_PASSES, type MatchPass } from './services/matching/passes.js';

export { projectReport } from './services/projection/record-projection.js';

export {
  ReportProcessor,
  loadSourceDocument,
  type ProcessOptions,
  type ProcessingSummary,
  type ProgressCallback,
} from './services/processing/processor.js';
export { listDataFolders, resolveJobFolder, type DataFolder } from './services/processing/folders.js';
export { findPdfFiles } from './services/processing/file-scanner.js';
export { ProcessingError } from './services/processing/errors.js';

export { JobRegistry, type JobRecord, type JobStatus } from './services/jobs/job-registry.js';
export { ProcessingScheduler } from './services/jobs/scheduler.js';
export { JobError, JobNotFoundError, JobStateError, JobCapacityError } from './services/jobs/errors.js';

export type { ReportRecord } from './models/report.js';
export type { Article, MergedDocument, MatchingStatistics } from './models/article.js';
export type { MatchResult, MatchPassNumber, MatchPassName } from './models/match.js';
export type { PageContent, Table } from './models/page.js';
