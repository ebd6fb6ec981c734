/**
 * Document text assembly
 *
 * Runs the page filter over every page of a PDF and joins the survivors
 * into one document text. Unreadable pages become warnings, not errors.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/extraction/document-extractor
 */

import { filterPage } from './page-filter.js';
import type { PageContent } from '../../models/page.js';
import type { ExtractionWarning, PageTable } from '../../models/article.js';

export interface ExtractedDocument {
  text: string;
  tables: PageTable[];
  warnings: ExtractionWarning[];
}

/**
 * Join filtered pages: lines with '\n', pages with a blank line.
 * Pages without lines add nothing, not even a separator.
 */
export function assembleDocumentText(pages: readonly (readonly string[])[]): string {
  return pages
    .filter((lines) => lines.length > 0)
    .map((lines) => lines.join('\n'))
    .join('\n\n');
}

/**
 * Filter and assemble the pages of one PDF.
 *
 * Pages are processed in ascending page order. A page carrying an `error`
 * contributes no lines and no tables and yields one warning.
 */
export function extractDocument(pdfFilename: string, pages: readonly PageContent[]): ExtractedDocument {
  const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
  const filtered: string[][] = [];
  const tables: PageTable[] = [];
  const warnings: ExtractionWarning[] = [];

  for (const page of ordered) {
    if (page.error !== undefined) {
      console.error(`[WARN] ${pdfFilename} page ${page.pageNumber} unreadable: ${page.error}`);
      warnings.push({ pdf_filename: pdfFilename, page: page.pageNumber, message: page.error });
      continue;
    }

    page.tables.forEach((table, idx) => {
      if (table.length > 0) {
        tables.push({ page: page.pageNumber, table_number: idx + 1, data: table });
      }
    });

    filtered.push(filterPage(page.rawText, page.tables));
  }

  return { text: assembleDocumentText(filtered), tables, warnings };
}
