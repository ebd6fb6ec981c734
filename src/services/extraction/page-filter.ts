/**
 * Page Filter
 *
 * Reduces one page's reading-order text to body lines: table echoes,
 * figure/table captions and source attribution lines are dropped.
 *
 * @module services/extraction/page-filter
 */

import type { Table } from '../../models/page.js';

/**
 * Caption line: a figure/table/image keyword, optional period, optional
 * whitespace, then a number, at line start.
 *
 * Matches "Figure 3: ...", "fig. 3", "Table 2 below shows...", "Foto 1".
 * Does not match "My Table of contents" or "Tables 4" (no digit after the keyword).
 */
export const CAPTION_REGEX =
  /^\s*(?:figure|fig|table|tabella|tbl|immagine|image|photo|foto)\.?\s*\d+/i;

/**
 * Attribution line: "Source" or "Fonte", optional whitespace, then a colon.
 */
export const ATTRIBUTION_REGEX = /^\s*(?:source|fonte)\s*:/i;

/**
 * Lines whose share of table-cell tokens is above this are table echoes
 */
export const TABLE_ECHO_THRESHOLD = 0.5;

const LINE_BREAK_REGEX = /\r\n|\r|\n/;
const WHITESPACE_REGEX = /\s+/;

/**
 * Collect every distinct trimmed string cell across the given tables.
 * Non-string and empty cells are ignored.
 */
export function collectTableCells(tables: readonly Table[]): Set<string> {
  const cells = new Set<string>();
  for (const table of tables) {
    for (const row of table) {
      if (!Array.isArray(row)) continue;
      for (const cell of row) {
        if (typeof cell !== 'string' || cell === '') continue;
        cells.add(cell.trim());
      }
    }
  }
  return cells;
}

/**
 * Fraction of whitespace-separated tokens in `line` that equal a table cell.
 * A line with no tokens scores 0.
 */
export function tableTokenRatio(line: string, tableCells: ReadonlySet<string>): number {
  const tokens = line.split(WHITESPACE_REGEX).filter((token) => token !== '');
  if (tokens.length === 0) return 0;
  const hits = tokens.filter((token) => tableCells.has(token)).length;
  return hits / tokens.length;
}

export function isCaptionLine(line: string): boolean {
  return CAPTION_REGEX.test(line);
}

export function isAttributionLine(line: string): boolean {
  return ATTRIBUTION_REGEX.test(line);
}

/**
 * Filter one page's raw text into body lines.
 *
 * @param rawText - Reading-order page text (null/undefined/empty gives no lines)
 * @param tables - Tables found on the same page (may be empty)
 * @returns Trimmed, non-empty lines in source order
 */
export function filterPage(
  rawText: string | null | undefined,
  tables: readonly Table[] = []
): string[] {
  if (!rawText) return [];

  const tableCells = tables.length > 0 ? collectTableCells(tables) : null;
  const lines: string[] = [];

  for (const rawLine of rawText.split(LINE_BREAK_REGEX)) {
    const line = rawLine.trim();
    if (line === '') continue;

    if (tableCells && tableTokenRatio(line, tableCells) > TABLE_ECHO_THRESHOLD) continue;
    if (isCaptionLine(line)) continue;
    if (isAttributionLine(line)) continue;

    lines.push(line);
  }

  return lines;
}
