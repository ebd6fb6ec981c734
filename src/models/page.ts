/**
 * Page content interfaces
 *
 * A page is the raw reading-order text of one PDF page plus the tables
 * detected on it. Pages are produced by a reader and consumed by the page
 * filter; they are never persisted.
 */

/**
 * Table cell: text, or null where the grid has no value
 */
export type TableCell = string | null;

/**
 * Table grid: rows of cells, rows may differ in length
 */
export type Table = TableCell[][];

export interface PageContent {
  /** 1-based page number */
  pageNumber: number;

  /** Reading-order text of the page, null when the page had none */
  rawText: string | null;

  tables: Table[];

  /** Set when the page could not be read; rawText is then null and tables empty */
  error?: string;
}
