/**
 * Processing Error Classes
 *
 * Failures that abort a whole processing run. Per-PDF problems are not
 * errors here: they become extraction warnings in the output.
 */

export type ProcessingErrorCategory =
  | 'SOURCE_JSON_NOT_FOUND'
  | 'SOURCE_JSON_INVALID'
  | 'FOLDER_NOT_FOUND'
  | 'PDF_SCAN_ERROR'
  | 'OUTPUT_WRITE_ERROR';

export class ProcessingError extends Error {
  constructor(
    message: string,
    public readonly category: ProcessingErrorCategory,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProcessingError';
  }
}
