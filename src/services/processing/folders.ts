/**
 * Job folder layout
 *
 * A job folder holds a `pdfs/` directory and one `<base>_reports.json`
 * metadata file. The merged output is written beside it as
 * `<base>_reports_full_text.json`.
 *
 * @module services/processing/folders
 */

import fs from 'fs';
import path from 'path';
import { ProcessingError } from './errors.js';

export const PDF_SUBDIR = 'pdfs';
export const SOURCE_JSON_SUFFIX = '_reports.json';
export const FULL_TEXT_SUFFIX = '_full_text.json';

export interface DataFolder {
  name: string;
  /** Absolute path */
  path: string;
  has_pdfs: boolean;
  has_json: boolean;
  pdf_count: number;
  json_file: string | null;
  already_processed: boolean;
  full_text_file: string | null;
}

export interface JobFolderPaths {
  folderPath: string;
  sourceJsonPath: string;
  pdfDirectory: string;
  outputJsonPath: string;
}

function isDirectory(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

function sortedFiles(dir: string, accept: (name: string) => boolean): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && accept(entry.name))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Describe every sub-directory of baseDir, sorted by name.
 * A missing baseDir yields [].
 */
export function listDataFolders(baseDir: string): DataFolder[] {
  if (!isDirectory(baseDir)) return [];

  const names = fs
    .readdirSync(baseDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  return names.map((name) => {
    const entryPath = path.join(baseDir, name);
    const pdfDir = path.join(entryPath, PDF_SUBDIR);
    const hasPdfs = isDirectory(pdfDir);
    const jsonFiles = sortedFiles(entryPath, (f) => f.endsWith(SOURCE_JSON_SUFFIX));
    const fullTextFiles = sortedFiles(entryPath, (f) => f.endsWith(FULL_TEXT_SUFFIX));
    const pdfCount = hasPdfs ? sortedFiles(pdfDir, (f) => f.toLowerCase().endsWith('.pdf')).length : 0;

    return {
      name,
      path: path.resolve(entryPath),
      has_pdfs: hasPdfs,
      has_json: jsonFiles.length > 0,
      pdf_count: pdfCount,
      json_file: jsonFiles[0] ?? null,
      already_processed: fullTextFiles.length > 0,
      full_text_file: fullTextFiles[0] ?? null,
    };
  });
}

/**
 * Resolve the input and output paths of a job folder.
 *
 * @throws ProcessingError FOLDER_NOT_FOUND or SOURCE_JSON_NOT_FOUND
 */
export function resolveJobFolder(folderPath: string): JobFolderPaths {
  if (!isDirectory(folderPath)) {
    throw new ProcessingError(`Folder not found: ${folderPath}`, 'FOLDER_NOT_FOUND', {
      folder_path: folderPath,
    });
  }

  const jsonFiles = sortedFiles(folderPath, (f) => f.endsWith(SOURCE_JSON_SUFFIX));
  if (jsonFiles.length === 0) {
    throw new ProcessingError(
      `No *${SOURCE_JSON_SUFFIX} file found in ${folderPath}`,
      'SOURCE_JSON_NOT_FOUND',
      { folder_path: folderPath }
    );
  }

  const sourceFile = jsonFiles[0];
  const baseName = sourceFile.slice(0, -SOURCE_JSON_SUFFIX.length);

  return {
    folderPath: path.resolve(folderPath),
    sourceJsonPath: path.join(folderPath, sourceFile),
    pdfDirectory: path.join(folderPath, PDF_SUBDIR),
    outputJsonPath: path.join(folderPath, `${baseName}_reports${FULL_TEXT_SUFFIX}`),
  };
}
