/**
 * Tests for source document and tool input schemas
 *
 * @module tests/unit/validation/schemas
 */

import { describe, it, expect } from 'vitest';
import {
  MatchInput,
  ProcessStartInput,
  SourceDocumentSchema,
  ValidationError,
  validateInput,
} from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// validateInput
// ═══════════════════════════════════════════════════════════════════════════════

describe('validateInput', () => {
  it('should return parsed data', () => {
    expect(validateInput(ProcessStartInput, { folder_path: '/data/chad' })).toEqual({
      folder_path: '/data/chad',
    });
  });

  it('should prefix messages with the field path', () => {
    expect(() => validateInput(ProcessStartInput, {})).toThrow(new ValidationError('folder_path: Required'));
    expect(() => validateInput(ProcessStartInput, { folder_path: '' })).toThrow(
      'folder_path: folder_path is required'
    );
  });

  it('should join several issues', () => {
    expect(() => validateInput(MatchInput, {})).toThrow('folder_path: Required; pdf_filename: Required');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// SourceDocumentSchema
// ═══════════════════════════════════════════════════════════════════════════════

describe('SourceDocumentSchema', () => {
  it('should default reports to an empty array', () => {
    const result = SourceDocumentSchema.parse({ disaster: 'Flood' });
    expect(result.reports).toEqual([]);
    expect(result.disaster).toBe('Flood');
  });

  it('should accept null header fields and keep unknown keys', () => {
    const result = SourceDocumentSchema.parse({
      emdat_event: { DisNo: null, country: 'Chad', magnitude: 7 },
      reports: [{ title: 'A' }],
      collected_by: 'crawler',
    });
    expect(result.emdat_event).toEqual({ DisNo: null, country: 'Chad', magnitude: 7 });
    expect(result).toHaveProperty('collected_by', 'crawler');
  });

  it('should reject non-object reports', () => {
    expect(SourceDocumentSchema.safeParse({ reports: ['a'] }).success).toBe(false);
    expect(SourceDocumentSchema.safeParse({ reports: {} }).success).toBe(false);
  });
});

describe('MatchInput', () => {
  it('should reject backslash paths', () => {
    expect(MatchInput.safeParse({ folder_path: 'x', pdf_filename: 'a\\b.pdf' }).success).toBe(false);
    expect(MatchInput.safeParse({ folder_path: 'x', pdf_filename: 'b.pdf' }).success).toBe(true);
  });
});
