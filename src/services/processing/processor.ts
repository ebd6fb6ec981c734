/**
 * Report Processing Orchestrator
 *
 * Pipeline: Source JSON -> PDF scan -> Extract -> Match -> Merge -> Write
 *
 * Per-PDF failures never abort the run: an unreadable PDF contributes an
 * empty text and an extraction warning. Source, scan and write failures
 * raise ProcessingError.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/processing/processor
 */

import fs from 'fs';
import path from 'path';
import { PdfjsReader, type PdfReader } from '../extraction/pdf-reader.js';
import { extractDocument, type ExtractedDocument } from '../extraction/document-extractor.js';
import { matchReport } from '../matching/matcher.js';
import { emptyProjection, projectReport } from '../projection/record-projection.js';
import { findPdfFiles } from './file-scanner.js';
import { ProcessingError } from './errors.js';
import { SourceDocumentSchema, type SourceDocument } from '../../utils/validation.js';
import type { ReportRecord } from '../../models/report.js';
import type { MatchPassNumber } from '../../models/match.js';
import type {
  Article,
  ExtractionWarning,
  MatchingStatistics,
  MergedDocument,
  PdfTables,
} from '../../models/article.js';

export type ProgressCallback = (percent: number, message: string) => void;

export interface ProcessOptions {
  sourceJsonPath: string;
  pdfDirectory: string;
  outputJsonPath: string;
  onProgress?: ProgressCallback;
}

export interface ProcessingSummary {
  output_path: string;
  total_articles: number;
  articles_with_pdf: number;
  articles_without_pdf: number;
  total_pdfs_processed: number;
  matching_statistics: MatchingStatistics;
  extraction_warnings: number;
}

interface ReportProcessorConfig {
  reader?: PdfReader;
  /** PDFs extracted in parallel (default: 2) */
  maxConcurrent?: number;
}

const STATISTIC_BY_PASS: Record<MatchPassNumber, keyof Omit<MatchingStatistics, 'no_match'>> = {
  1: 'exact_match',
  2: 'partial_match',
  3: 'id_match',
  4: 'reliefweb_id_match',
  5: 'title_match',
};

/** Progress band covered by per-PDF extraction */
const EXTRACTION_START = 10;
const EXTRACTION_SPAN = 70;

function emptyStatistics(): MatchingStatistics {
  return {
    exact_match: 0,
    partial_match: 0,
    id_match: 0,
    reliefweb_id_match: 0,
    title_match: 0,
    no_match: 0,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Character count in code points, so astral characters count once
 */
function textLength(text: string): number {
  return [...text].length;
}

/**
 * Load and validate the source metadata document.
 *
 * @throws ProcessingError SOURCE_JSON_NOT_FOUND or SOURCE_JSON_INVALID
 */
export async function loadSourceDocument(sourceJsonPath: string): Promise<SourceDocument> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(sourceJsonPath, 'utf-8');
  } catch (error) {
    throw new ProcessingError(
      `Failed to load source JSON ${sourceJsonPath}: ${errorMessage(error)}`,
      'SOURCE_JSON_NOT_FOUND',
      { source_json: sourceJsonPath }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ProcessingError(
      `Source JSON ${sourceJsonPath} is not valid JSON: ${errorMessage(error)}`,
      'SOURCE_JSON_INVALID',
      { source_json: sourceJsonPath }
    );
  }

  const result = SourceDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ProcessingError(
      `Source JSON ${sourceJsonPath} has an unexpected shape: ${issues.join('; ')}`,
      'SOURCE_JSON_INVALID',
      { source_json: sourceJsonPath }
    );
  }
  return result.data;
}

type DocumentHeader = Pick<
  MergedDocument,
  'DisNo' | 'disaster_type' | 'country' | 'iso2' | 'location' | 'start_dt' | 'query'
>;

function headerText(value: string | number | null | undefined): string | undefined {
  return value === null || value === undefined ? undefined : String(value);
}

/**
 * Output header from the EM-DAT event, falling back to top-level fields
 */
export function buildHeader(source: SourceDocument): DocumentHeader {
  const event = source.emdat_event;
  return {
    DisNo: headerText(event?.DisNo) ?? '',
    disaster_type: headerText(event?.disaster_type) ?? source.disaster ?? '',
    country: headerText(event?.country) ?? source.country ?? '',
    iso2: headerText(event?.iso2) ?? source.country_code ?? '',
    location: headerText(event?.location) ?? '',
    start_dt: headerText(event?.start_dt) ?? '',
    query: headerText(event?.query) ?? source.disaster ?? '',
  };
}

export class ReportProcessor {
  private readonly reader: PdfReader;
  private readonly maxConcurrent: number;

  constructor(config: ReportProcessorConfig = {}) {
    this.reader = config.reader ?? new PdfjsReader();
    this.maxConcurrent = Math.max(1, config.maxConcurrent ?? 2);
  }

  /**
   * Merge a folder of PDFs with its metadata records and write the result.
   */
  async process(options: ProcessOptions): Promise<ProcessingSummary> {
    const { sourceJsonPath, pdfDirectory, outputJsonPath } = options;
    const progress = (percent: number, message: string): void => {
      options.onProgress?.(percent, message);
      console.error(`[INFO] [${percent}%] ${message}`);
    };

    progress(0, 'Loading source JSON...');
    const source = await loadSourceDocument(sourceJsonPath);
    const reports: readonly ReportRecord[] = source.reports;

    progress(5, 'Scanning for PDF files...');
    if (!fs.existsSync(pdfDirectory)) {
      console.error(`[WARN] PDF directory not found: ${pdfDirectory}`);
    }
    const pdfFiles = await findPdfFiles(pdfDirectory).catch((error: unknown) => {
      throw new ProcessingError(
        `Failed to scan PDF directory ${pdfDirectory}: ${errorMessage(error)}`,
        'PDF_SCAN_ERROR',
        { pdf_directory: pdfDirectory }
      );
    });
    const totalPdfs = pdfFiles.length;
    progress(EXTRACTION_START, `Found ${totalPdfs} PDF files`);

    const extracted = await this.extractAll(pdfFiles, progress);

    const articles: Article[] = [];
    const pdfTables: PdfTables[] = [];
    const warnings: ExtractionWarning[] = [];
    const statistics = emptyStatistics();
    const matchedIndices = new Set<number>();

    pdfFiles.forEach((pdfPath, idx) => {
      const pdfFilename = path.basename(pdfPath);
      const doc = extracted[idx];
      warnings.push(...doc.warnings);
      if (doc.tables.length > 0) {
        pdfTables.push({ pdf_filename: pdfFilename, tables: doc.tables });
      }

      const match = matchReport(pdfFilename, reports);
      if (match) {
        matchedIndices.add(match.index);
        statistics[STATISTIC_BY_PASS[match.pass]] += 1;
      } else {
        statistics.no_match += 1;
      }

      articles.push({
        pdf_filename: pdfFilename,
        has_pdf: true,
        pdf_text: doc.text,
        pdf_text_length: textLength(doc.text),
        match_pass: match ? match.pass : null,
        ...(match ? projectReport(match.report) : emptyProjection()),
      });
    });

    progress(82, 'Adding reports without PDFs...');
    reports.forEach((report, idx) => {
      if (matchedIndices.has(idx)) return;
      articles.push({
        pdf_filename: '',
        has_pdf: false,
        pdf_text: '',
        pdf_text_length: 0,
        match_pass: null,
        ...projectReport(report),
      });
    });

    const output: MergedDocument = {
      ...buildHeader(source),
      articles,
      n_documents: articles.length,
      pdf_tables: pdfTables,
      processing_metadata: {
        processing_date: new Date().toISOString(),
        source_json: sourceJsonPath,
        pdf_directory: pdfDirectory,
        total_pdfs_found: totalPdfs,
        total_reports: reports.length,
        matching_statistics: statistics,
        extraction_warnings: warnings,
      },
    };

    progress(90, 'Saving output JSON...');
    await writeOutput(outputJsonPath, output);

    const withPdf = articles.filter((a) => a.has_pdf).length;
    progress(100, 'Processing complete!');

    return {
      output_path: outputJsonPath,
      total_articles: articles.length,
      articles_with_pdf: withPdf,
      articles_without_pdf: articles.length - withPdf,
      total_pdfs_processed: totalPdfs,
      matching_statistics: statistics,
      extraction_warnings: warnings.length,
    };
  }

  /**
   * Extract every PDF, at most maxConcurrent at a time. Results keep the
   * order of pdfFiles.
   */
  private async extractAll(
    pdfFiles: readonly string[],
    progress: ProgressCallback
  ): Promise<ExtractedDocument[]> {
    const total = pdfFiles.length;
    const results: ExtractedDocument[] = [];

    for (let i = 0; i < total; i += this.maxConcurrent) {
      const batch = pdfFiles.slice(i, i + this.maxConcurrent);
      const batchResults = await Promise.all(
        batch.map((pdfPath, offset) => {
          const idx = i + offset;
          const name = path.basename(pdfPath);
          const percent = EXTRACTION_START + Math.floor((idx / Math.max(total, 1)) * EXTRACTION_SPAN);
          progress(percent, `Processing PDF ${idx + 1}/${total}: ${name.slice(0, 50)}...`);
          return this.extractOne(pdfPath);
        })
      );
      results.push(...batchResults);
    }

    return results;
  }

  private async extractOne(pdfPath: string): Promise<ExtractedDocument> {
    const pdfFilename = path.basename(pdfPath);
    try {
      const pages = await this.reader.readPages(pdfPath);
      return extractDocument(pdfFilename, pages);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[WARN] [Extraction] ${pdfFilename} skipped: ${message}`);
      return {
        text: '',
        tables: [],
        warnings: [{ pdf_filename: pdfFilename, page: null, message }],
      };
    }
  }
}

async function writeOutput(outputJsonPath: string, output: MergedDocument): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(outputJsonPath), { recursive: true });
    await fs.promises.writeFile(outputJsonPath, JSON.stringify(output, null, 2), 'utf-8');
  } catch (error) {
    throw new ProcessingError(
      `Failed to write output JSON ${outputJsonPath}: ${errorMessage(error)}`,
      'OUTPUT_WRITE_ERROR',
      { output_json: outputJsonPath }
    );
  }
}
