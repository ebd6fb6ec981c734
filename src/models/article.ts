/**
 * Article and output document interfaces
 *
 * An article is one entry of the merged output: either a PDF with its
 * extracted text, or a report that never matched any PDF.
 */

import type { ReportDate } from './report.js';
import type { MatchPassNumber } from './match.js';
import type { Table } from './page.js';

/**
 * Flat article fields produced by record projection
 */
export interface ProjectedReport {
  title: string;
  date: ReportDate;
  url: string;
  sources: string[];
  countries: string[];
  disasters: string[];
  language: string;
  body_text: string;
}

/**
 * One merged article in the output document
 */
export interface Article extends ProjectedReport {
  /** Base filename of the PDF ('' for reports without a PDF) */
  pdf_filename: string;

  has_pdf: boolean;

  /** Filtered body text of the PDF */
  pdf_text: string;

  pdf_text_length: number;

  /** Matching pass that linked the PDF to its report (null when unmatched or no PDF) */
  match_pass: MatchPassNumber | null;
}

/**
 * A table located on a given page of a PDF
 */
export interface PageTable {
  /** 1-based page number */
  page: number;

  /** 1-based table number within the page */
  table_number: number;

  data: Table;
}

/**
 * Tables of one PDF, as listed in the output document
 */
export interface PdfTables {
  pdf_filename: string;
  tables: PageTable[];
}

/**
 * Article counts per matching pass
 */
export interface MatchingStatistics {
  exact_match: number;
  partial_match: number;
  id_match: number;
  reliefweb_id_match: number;
  title_match: number;
  no_match: number;
}

export interface ExtractionWarning {
  pdf_filename: string;
  /** 1-based page number, null when the whole PDF failed to open */
  page: number | null;
  message: string;
}

export interface ProcessingMetadata {
  processing_date: string;
  source_json: string;
  pdf_directory: string;
  total_pdfs_found: number;
  total_reports: number;
  matching_statistics: MatchingStatistics;
  extraction_warnings: ExtractionWarning[];
}

/**
 * The merged full-text document written by the processor
 */
export interface MergedDocument {
  DisNo: string;
  disaster_type: string;
  country: string;
  iso2: string;
  location: string;
  start_dt: string;
  query: string;
  articles: Article[];
  n_documents: number;
  pdf_tables: PdfTables[];
  processing_metadata: ProcessingMetadata;
}
