/**
 * Unit tests for the Report Processor
 *
 * Runs the whole merge against a temp folder with an in-process PDF reader.
 *
 * @module tests/unit/processing/processor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, readFileSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  ReportProcessor,
  buildHeader,
  loadSourceDocument,
} from '../../../src/services/processing/processor.js';
import { ProcessingError } from '../../../src/services/processing/errors.js';
import { PdfOpenError } from '../../../src/services/extraction/errors.js';
import type { MergedDocument } from '../../../src/models/article.js';
import { FakePdfReader } from '../../helpers/fake-reader.js';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const SOURCE = {
  emdat_event: {
    DisNo: '2023-0001-HTI',
    disaster_type: 'Flood',
    country: 'Haiti',
    iso2: 'HT',
    location: 'Ouest',
    start_dt: '2023-06-03',
  },
  disaster: 'Haiti Floods 2023',
  reports: [
    {
      reliefweb_id: 101,
      title: 'Situation Report',
      files: [{ saved_filename: '101_situation_report.pdf' }],
      source: [{ name: 'OCHA' }],
      date: { created: '2023-06-05' },
    },
    { reliefweb_id: 202, title: 'Flash Update', files: [] },
    { title: 'Duplicate Title', url: 'https://example.org/a' },
    { title: 'Duplicate Title', url: 'https://example.org/b' },
    { reliefweb_id: 999, title: 'Situation Report' },
  ],
};

function makeReader(folder: string): FakePdfReader {
  return new FakePdfReader({
    '101_situation_report.pdf': [
      {
        pageNumber: 1,
        rawText: 'Heavy rain hit the west.\nFigure 1: Rainfall map\nSource: NOAA',
        tables: [],
      },
      {
        pageNumber: 2,
        rawText: 'Region Deaths\nNorth 12\nResponse continues.',
        tables: [
          [
            ['Region', 'Deaths'],
            ['North', '12'],
          ],
        ],
      },
    ],
    '202_flash_update.pdf': [
      { pageNumber: 1, rawText: 'Flash flooding reported.', tables: [] },
      { pageNumber: 2, rawText: null, tables: [], error: 'Invalid page' },
    ],
    'broken.pdf': new PdfOpenError(
      'Cannot open PDF broken.pdf: Invalid PDF structure',
      join(folder, 'pdfs', 'broken.pdf')
    ),
    'zzz_unrelated_notes.pdf': [{ pageNumber: 1, rawText: 'Meeting notes', tables: [] }],
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// END TO END
// ═══════════════════════════════════════════════════════════════════════════════

describe('ReportProcessor', () => {
  let folder: string;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    folder = mkdtempSync(join(tmpdir(), 'test-merge-'));
    mkdirSync(join(folder, 'pdfs', 'sub'), { recursive: true });
    for (const name of ['101_situation_report.pdf', 'broken.pdf', 'zzz_unrelated_notes.pdf']) {
      writeFileSync(join(folder, 'pdfs', name), 'placeholder');
    }
    writeFileSync(join(folder, 'pdfs', 'sub', '202_flash_update.pdf'), 'placeholder');
    writeFileSync(join(folder, 'haiti_reports.json'), JSON.stringify(SOURCE));
  });

  afterEach(() => {
    errorSpy.mockRestore();
    rmSync(folder, { recursive: true, force: true });
  });

  async function runMerge(): Promise<{ output: MergedDocument; progress: number[] }> {
    const progress: number[] = [];
    const processor = new ReportProcessor({ reader: makeReader(folder), maxConcurrent: 2 });
    await processor.process({
      sourceJsonPath: join(folder, 'haiti_reports.json'),
      pdfDirectory: join(folder, 'pdfs'),
      outputJsonPath: join(folder, 'out', 'haiti_reports_full_text.json'),
      onProgress: (percent) => progress.push(percent),
    });
    const output: MergedDocument = JSON.parse(
      readFileSync(join(folder, 'out', 'haiti_reports_full_text.json'), 'utf-8')
    );
    return { output, progress };
  }

  it('should write the header with fallbacks to top-level fields', async () => {
    const { output } = await runMerge();
    expect(output.DisNo).toBe('2023-0001-HTI');
    expect(output.disaster_type).toBe('Flood');
    expect(output.country).toBe('Haiti');
    expect(output.iso2).toBe('HT');
    expect(output.location).toBe('Ouest');
    expect(output.start_dt).toBe('2023-06-03');
    expect(output.query).toBe('Haiti Floods 2023');
  });

  it('should emit one article per PDF in sorted path order, then unmatched reports', async () => {
    const { output } = await runMerge();
    expect(output.articles.map((a) => [a.pdf_filename, a.title, a.match_pass])).toEqual([
      ['101_situation_report.pdf', 'Situation Report', 1],
      ['broken.pdf', '', null],
      ['202_flash_update.pdf', 'Flash Update', 4],
      ['zzz_unrelated_notes.pdf', '', null],
      ['', 'Duplicate Title', null],
      ['', 'Duplicate Title', null],
      ['', 'Situation Report', null],
    ]);
    expect(output.n_documents).toBe(7);
  });

  it('should carry the filtered PDF text and projected fields', async () => {
    const { output } = await runMerge();
    expect(output.articles[0]).toEqual({
      pdf_filename: '101_situation_report.pdf',
      has_pdf: true,
      pdf_text: 'Heavy rain hit the west.\n\nResponse continues.',
      pdf_text_length: 45,
      match_pass: 1,
      title: 'Situation Report',
      date: { created: '2023-06-05', changed: '', original: '' },
      url: '',
      sources: ['OCHA'],
      countries: [],
      disasters: [],
      language: '',
      body_text: '',
    });
  });

  it('should keep an unreadable PDF as an empty article', async () => {
    const { output } = await runMerge();
    expect(output.articles[1]).toMatchObject({
      pdf_filename: 'broken.pdf',
      has_pdf: true,
      pdf_text: '',
      pdf_text_length: 0,
      date: { created: '', changed: '', original: '' },
    });
  });

  it('should not collapse unmatched reports that share a title', async () => {
    const { output } = await runMerge();
    const unmatched = output.articles.filter((a) => !a.has_pdf);
    expect(unmatched.map((a) => a.url)).toEqual(['https://example.org/a', 'https://example.org/b', '']);
    expect(unmatched.every((a) => a.pdf_text === '' && a.pdf_text_length === 0)).toBe(true);
  });

  it('should list tables per PDF', async () => {
    const { output } = await runMerge();
    expect(output.pdf_tables).toEqual([
      {
        pdf_filename: '101_situation_report.pdf',
        tables: [
          {
            page: 2,
            table_number: 1,
            data: [
              ['Region', 'Deaths'],
              ['North', '12'],
            ],
          },
        ],
      },
    ]);
  });

  it('should record statistics and warnings in the metadata', async () => {
    const { output } = await runMerge();
    const meta = output.processing_metadata;
    expect(meta.source_json).toBe(join(folder, 'haiti_reports.json'));
    expect(meta.pdf_directory).toBe(join(folder, 'pdfs'));
    expect(meta.total_pdfs_found).toBe(4);
    expect(meta.total_reports).toBe(5);
    expect(meta.matching_statistics).toEqual({
      exact_match: 1,
      partial_match: 0,
      id_match: 0,
      reliefweb_id_match: 1,
      title_match: 0,
      no_match: 2,
    });
    expect(meta.extraction_warnings).toEqual([
      {
        pdf_filename: 'broken.pdf',
        page: null,
        message: 'Cannot open PDF broken.pdf: Invalid PDF structure',
      },
      { pdf_filename: '202_flash_update.pdf', page: 2, message: 'Invalid page' },
    ]);
    expect(Number.isNaN(Date.parse(meta.processing_date))).toBe(false);
  });

  it('should report progress through every stage', async () => {
    const { progress } = await runMerge();
    expect(progress).toEqual([0, 5, 10, 10, 27, 45, 62, 82, 90, 100]);
  });

  it('should return a summary', async () => {
    const processor = new ReportProcessor({ reader: makeReader(folder) });
    const outputPath = join(folder, 'haiti_reports_full_text.json');
    const summary = await processor.process({
      sourceJsonPath: join(folder, 'haiti_reports.json'),
      pdfDirectory: join(folder, 'pdfs'),
      outputJsonPath: outputPath,
    });

    expect(summary).toEqual({
      output_path: outputPath,
      total_articles: 7,
      articles_with_pdf: 4,
      articles_without_pdf: 3,
      total_pdfs_processed: 4,
      matching_statistics: {
        exact_match: 1,
        partial_match: 0,
        id_match: 0,
        reliefweb_id_match: 1,
        title_match: 0,
        no_match: 2,
      },
      extraction_warnings: 2,
    });
  });

  it('should read every PDF exactly once', async () => {
    const reader = makeReader(folder);
    await new ReportProcessor({ reader, maxConcurrent: 3 }).process({
      sourceJsonPath: join(folder, 'haiti_reports.json'),
      pdfDirectory: join(folder, 'pdfs'),
      outputJsonPath: join(folder, 'merged.json'),
    });
    expect([...reader.calls].sort()).toEqual([
      '101_situation_report.pdf',
      '202_flash_update.pdf',
      'broken.pdf',
      'zzz_unrelated_notes.pdf',
    ]);
  });

  it('should append every report when the PDF directory is missing', async () => {
    const summary = await new ReportProcessor({ reader: makeReader(folder) }).process({
      sourceJsonPath: join(folder, 'haiti_reports.json'),
      pdfDirectory: join(folder, 'no-pdfs-here'),
      outputJsonPath: join(folder, 'merged.json'),
    });
    expect(summary.total_pdfs_processed).toBe(0);
    expect(summary.articles_without_pdf).toBe(5);
  });

  it('should raise PDF_SCAN_ERROR when the PDF path is not a directory', async () => {
    const run = new ReportProcessor({ reader: makeReader(folder) }).process({
      sourceJsonPath: join(folder, 'haiti_reports.json'),
      pdfDirectory: join(folder, 'haiti_reports.json'),
      outputJsonPath: join(folder, 'merged.json'),
    });

    await expect(run).rejects.toBeInstanceOf(ProcessingError);
    await expect(run).rejects.toMatchObject({
      category: 'PDF_SCAN_ERROR',
      details: { pdf_directory: join(folder, 'haiti_reports.json') },
    });
    expect(existsSync(join(folder, 'merged.json'))).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE LOADING
// ═══════════════════════════════════════════════════════════════════════════════

describe('loadSourceDocument', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'test-merge-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function categoryOf(promise: Promise<unknown>): Promise<string> {
    try {
      await promise;
    } catch (error) {
      if (error instanceof ProcessingError) return error.category;
      throw error;
    }
    return 'resolved';
  }

  it('should reject a missing file', async () => {
    expect(await categoryOf(loadSourceDocument(join(dir, 'none.json')))).toBe('SOURCE_JSON_NOT_FOUND');
  });

  it('should reject text that is not JSON', async () => {
    writeFileSync(join(dir, 'bad.json'), '{not json');
    expect(await categoryOf(loadSourceDocument(join(dir, 'bad.json')))).toBe('SOURCE_JSON_INVALID');
  });

  it('should reject a reports field that is not a list of objects', async () => {
    writeFileSync(join(dir, 'shape.json'), JSON.stringify({ reports: ['a'] }));
    expect(await categoryOf(loadSourceDocument(join(dir, 'shape.json')))).toBe('SOURCE_JSON_INVALID');
  });

  it('should default reports to an empty list and keep extra keys', async () => {
    writeFileSync(join(dir, 'min.json'), JSON.stringify({ disaster: 'Drought', extra: 1 }));
    const doc = await loadSourceDocument(join(dir, 'min.json'));
    expect(doc.reports).toEqual([]);
    expect(doc.extra).toBe(1);
  });
});

describe('buildHeader', () => {
  it('should fall back to top-level fields without an event', () => {
    expect(
      buildHeader({ disaster: 'Cyclone Freddy', country: 'Malawi', country_code: 'MW', reports: [] })
    ).toEqual({
      DisNo: '',
      disaster_type: 'Cyclone Freddy',
      country: 'Malawi',
      iso2: 'MW',
      location: '',
      start_dt: '',
      query: 'Cyclone Freddy',
    });
  });
});

describe('buildHeader - numeric event fields', () => {
  it('should write numbers from the event as text', () => {
    expect(
      buildHeader({
        emdat_event: { DisNo: 20230001, start_dt: 20230603, country: null },
        country: 'Haiti',
        reports: [],
      })
    ).toEqual({
      DisNo: '20230001',
      disaster_type: '',
      country: 'Haiti',
      iso2: '',
      location: '',
      start_dt: '20230603',
      query: '',
    });
  });

  it('should accept numeric event fields in the source JSON', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'test-merge-'));
    try {
      writeFileSync(
        join(dir, 'num_reports.json'),
        JSON.stringify({ emdat_event: { DisNo: 7, start_dt: 2023 }, reports: [] })
      );
      const doc = await loadSourceDocument(join(dir, 'num_reports.json'));
      expect(buildHeader(doc).DisNo).toBe('7');
      expect(buildHeader(doc).start_dt).toBe('2023');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
