/**
 * PDF Report Merge - Zod Validation Schemas
 *
 * Input validation for the source metadata document and all MCP tool inputs.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE DOCUMENT SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const HeaderValue = z.union([z.string(), z.number()]).nullish();

/**
 * EM-DAT event header. Every field may be absent or null, numbers are
 * accepted where exports write them (DisNo, dates); unknown keys are kept.
 */
export const EmdatEventSchema = z
  .object({
    DisNo: HeaderValue,
    disaster_type: HeaderValue,
    country: HeaderValue,
    iso2: HeaderValue,
    location: HeaderValue,
    start_dt: HeaderValue,
    query: HeaderValue,
  })
  .passthrough();

/**
 * Source metadata document (`*_reports.json`).
 *
 * Reports are only required to be objects: their fields are read through
 * the narrowing accessors in models/report so malformed fields degrade to
 * empty values instead of failing the whole document.
 */
export const SourceDocumentSchema = z
  .object({
    emdat_event: EmdatEventSchema.optional(),
    disaster: z.string().nullish(),
    country: z.string().nullish(),
    country_code: z.string().nullish(),
    reports: z.array(z.record(z.unknown())).default([]),
  })
  .passthrough();

export type SourceDocument = z.infer<typeof SourceDocumentSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for listing data folders
 */
export const FolderListInput = z.object({
  base_dir: z
    .string()
    .min(1)
    .optional()
    .describe('Directory holding job folders (default: REPORT_MERGE_DATA_DIR)'),
});

/**
 * Schema for starting a processing job
 */
export const ProcessStartInput = z.object({
  folder_path: z
    .string()
    .min(1, 'folder_path is required')
    .describe('Job folder containing pdfs/ and a *_reports.json file'),
});

/**
 * Schema for polling a processing job
 */
export const ProcessStatusInput = z.object({
  job_id: z.string().min(1, 'job_id is required'),
});

/**
 * Schema for matching one filename against a folder's reports
 */
export const MatchInput = z.object({
  folder_path: z.string().min(1, 'folder_path is required'),
  pdf_filename: z
    .string()
    .min(1, 'pdf_filename is required')
    .refine((name) => !name.includes('/') && !name.includes('\\'), {
      message: 'pdf_filename must be a base filename, not a path',
    }),
});
