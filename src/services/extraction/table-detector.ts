/**
 * Table detection from positioned text items
 *
 * pdfjs exposes text runs with coordinates but no table structure. Tables
 * are recovered by grouping items into rows by y position, finding x
 * positions that recur across many rows (columns), and taking runs of at
 * least MIN_TABLE_ROWS consecutive rows whose items sit on those columns.
 *
 * @module services/extraction/table-detector
 */

import type { Table, TableCell } from '../../models/page.js';

/**
 * Text run with PDF coordinates (origin bottom-left, y grows upward)
 */
export interface PositionedTextItem {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Number of column buckets across the page width */
const COLUMN_BUCKETS = 50;

/** Share of rows an x bucket must appear in to count as a column */
const COLUMN_ROW_SHARE = 0.3;

/** Consecutive aligned rows needed for a table region */
const MIN_TABLE_ROWS = 3;

/** Minimum row-grouping tolerance in PDF units */
const MIN_ROW_TOLERANCE = 3;

interface TableRegion {
  startRow: number;
  endRow: number;
  columns: number[];
}

/**
 * Group items into rows, top of page first, items left to right.
 */
export function groupRows(items: readonly PositionedTextItem[]): PositionedTextItem[][] {
  if (items.length === 0) return [];

  const avgHeight = items.reduce((sum, item) => sum + item.height, 0) / items.length;
  const tolerance = Math.max(avgHeight * 0.5, MIN_ROW_TOLERANCE);

  const rows = new Map<number, PositionedTextItem[]>();
  for (const item of items) {
    const key = Math.round(item.y / tolerance) * tolerance;
    const row = rows.get(key);
    if (row) {
      row.push(item);
    } else {
      rows.set(key, [item]);
    }
  }

  return Array.from(rows.entries())
    .sort((a, b) => b[0] - a[0])
    .map(([, row]) => row.sort((a, b) => a.x - b.x));
}

function findColumns(rows: readonly PositionedTextItem[][], bucketSize: number): number[] {
  const counts = new Map<number, number>();
  for (const row of rows) {
    for (const item of row) {
      const bucket = Math.round(item.x / bucketSize) * bucketSize;
      counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
    }
  }

  const threshold = rows.length * COLUMN_ROW_SHARE;
  return Array.from(counts.entries())
    .filter(([, count]) => count >= threshold)
    .map(([position]) => position)
    .sort((a, b) => a - b);
}

function findRegions(
  rows: readonly PositionedTextItem[][],
  columns: readonly number[],
  bucketSize: number
): TableRegion[] {
  const regions: TableRegion[] = [];
  let start = -1;

  const close = (end: number): void => {
    if (start !== -1 && end - start + 1 >= MIN_TABLE_ROWS) {
      regions.push({ startRow: start, endRow: end, columns: [...columns] });
    }
    start = -1;
  };

  rows.forEach((row, idx) => {
    const aligned = row.filter((item) =>
      columns.some((column) => Math.abs(column - item.x) < bucketSize * 1.5)
    ).length;
    const isTableRow = row.length >= 2 && aligned >= Math.min(row.length, columns.length) * 0.5;

    if (isTableRow) {
      if (start === -1) start = idx;
    } else {
      close(idx - 1);
    }
  });
  close(rows.length - 1);

  return regions;
}

function buildGrid(rows: readonly PositionedTextItem[][], columns: readonly number[]): Table {
  const spacing = columns.length > 1 ? (columns[1] - columns[0]) * 0.75 : 50;
  const grid: Table = [];

  for (const row of rows) {
    const cells: TableCell[] = columns.map(() => null);

    for (const item of row) {
      let best = 0;
      let bestDistance = Infinity;
      columns.forEach((column, idx) => {
        const distance = Math.abs(item.x - column);
        if (distance < bestDistance) {
          bestDistance = distance;
          best = idx;
        }
      });

      if (bestDistance < spacing * 2) {
        const text = item.text.trim();
        if (text === '') continue;
        const existing = cells[best];
        cells[best] = existing ? `${existing} ${text}` : text;
      }
    }

    if (cells.some((cell) => cell !== null)) {
      grid.push(cells);
    }
  }

  return grid;
}

/**
 * Detect tables on one page.
 *
 * @param items - Text runs of the page
 * @param pageWidth - Page width in PDF units
 * @returns Cell grids, top of page first; empty when no aligned region is found
 */
export function detectTables(items: readonly PositionedTextItem[], pageWidth: number): Table[] {
  const visible = items.filter((item) => item.text.trim() !== '');
  if (visible.length < 4 || pageWidth <= 0) return [];

  const rows = groupRows(visible);
  const bucketSize = pageWidth / COLUMN_BUCKETS;
  const columns = findColumns(rows, bucketSize);
  if (columns.length < 2) return [];

  const tables: Table[] = [];
  for (const region of findRegions(rows, columns, bucketSize)) {
    const grid = buildGrid(rows.slice(region.startRow, region.endRow + 1), region.columns);
    if (grid.length >= 2) tables.push(grid);
  }
  return tables;
}
