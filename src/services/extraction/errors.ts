/**
 * Extraction Error Classes
 *
 * Raised by PDF readers. The processor turns them into warnings so one
 * bad PDF never aborts a job.
 */

type ExtractionErrorCategory = 'PDF_OPEN_ERROR' | 'PDF_READ_ERROR';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly category: ExtractionErrorCategory,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * The file could not be read from disk or parsed as a PDF at all
 */
export class PdfOpenError extends ExtractionError {
  constructor(message: string, filePath: string) {
    super(message, 'PDF_OPEN_ERROR', filePath);
    this.name = 'PdfOpenError';
  }
}
