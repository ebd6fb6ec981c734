/**
 * PDF page reader (pdfjs-dist)
 *
 * Produces, per page, the reading-order text (no positional layout) and
 * the tables detected from text-item alignment. A page that fails to
 * load is returned with an `error` instead of aborting the document.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/extraction/pdf-reader
 */

import fs from 'fs';
import { createRequire } from 'module';
import { pathToFileURL } from 'url';
import {
  getDocument,
  GlobalWorkerOptions,
  VerbosityLevel,
} from 'pdfjs-dist/legacy/build/pdf.mjs';
import { PdfOpenError } from './errors.js';
import { detectTables, type PositionedTextItem } from './table-detector.js';
import type { PageContent } from '../../models/page.js';

/**
 * Source of page content for one PDF file
 */
export interface PdfReader {
  readPages(filePath: string): Promise<PageContent[]>;
}

/**
 * Subset of a pdfjs text item used here
 */
export interface RawTextItem {
  str: string;
  transform: unknown[];
  width: number;
  height: number;
  hasEOL: boolean;
}

export function isRawTextItem(item: unknown): item is RawTextItem {
  if (typeof item !== 'object' || item === null) return false;
  return (
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform) &&
    'width' in item &&
    typeof item.width === 'number' &&
    'height' in item &&
    typeof item.height === 'number' &&
    'hasEOL' in item &&
    typeof item.hasEOL === 'boolean'
  );
}

/**
 * Reading-order text of a page: runs are concatenated, a line break
 * follows every run flagged as end-of-line.
 */
export function buildRawText(items: readonly RawTextItem[]): string {
  let text = '';
  for (const item of items) {
    text += item.str;
    if (item.hasEOL) text += '\n';
  }
  return text;
}

export function toPositionedItems(items: readonly RawTextItem[]): PositionedTextItem[] {
  return items.map((item) => ({
    text: item.str,
    x: Number(item.transform[4] ?? 0),
    y: Number(item.transform[5] ?? 0),
    width: item.width,
    height: item.height,
  }));
}

let workerConfigured = false;

function configureWorker(): void {
  if (workerConfigured) return;
  const require = createRequire(import.meta.url);
  const workerPath = require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs');
  GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
  workerConfigured = true;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PdfjsReader implements PdfReader {
  async readPages(filePath: string): Promise<PageContent[]> {
    configureWorker();

    let data: Uint8Array;
    try {
      data = new Uint8Array(await fs.promises.readFile(filePath));
    } catch (error) {
      throw new PdfOpenError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath);
    }

    const loadingTask = getDocument({
      data,
      isEvalSupported: false,
      verbosity: VerbosityLevel.ERRORS,
    });

    const pdf = await loadingTask.promise.catch(async (error: unknown) => {
      await loadingTask.destroy();
      throw new PdfOpenError(`Cannot open PDF ${filePath}: ${errorMessage(error)}`, filePath);
    });

    const pages: PageContent[] = [];
    try {
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        try {
          const page = await pdf.getPage(pageNumber);
          const viewport = page.getViewport({ scale: 1 });
          const content = await page.getTextContent();
          const items: RawTextItem[] = [];
          for (const item of content.items) {
            if (isRawTextItem(item)) items.push(item);
          }

          pages.push({
            pageNumber,
            rawText: buildRawText(items),
            tables: detectTables(toPositionedItems(items), viewport.width),
          });
          page.cleanup();
        } catch (error) {
          pages.push({ pageNumber, rawText: null, tables: [], error: errorMessage(error) });
        }
      }
    } finally {
      await pdf.destroy();
    }

    return pages;
  }
}
