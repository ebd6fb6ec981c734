/**
 * Unit tests for filename helpers used by the matcher
 *
 * @module tests/unit/matching/filename
 */

import { describe, it, expect } from 'vitest';
import {
  stripPdf,
  filenameSegments,
  identifierPrefix,
  candidateIdentifier,
  normalizeLabel,
  titleLabel,
} from '../../../src/services/matching/filename.js';

describe('stripPdf', () => {
  it('should remove every ".pdf" occurrence, not only the extension', () => {
    expect(stripPdf('report.pdf')).toBe('report');
    expect(stripPdf('a.pdf_copy.pdf')).toBe('a_copy');
  });

  it('should be case-sensitive', () => {
    expect(stripPdf('REPORT.PDF')).toBe('REPORT.PDF');
  });
});

describe('filename segments', () => {
  it('should split the stripped name on underscores', () => {
    expect(filenameSegments('12345_67_flood.pdf')).toEqual(['12345', '67', 'flood']);
  });

  it('should form the identifier prefix from the first two segments', () => {
    expect(identifierPrefix('12345_67_flood.pdf')).toBe('12345_67');
    expect(identifierPrefix('12345_report.pdf')).toBe('12345_report');
    expect(identifierPrefix('report.pdf')).toBeNull();
  });

  it('should take the first segment as candidate identifier', () => {
    expect(candidateIdentifier('12345_report.pdf')).toBe('12345');
    expect(candidateIdentifier('report.pdf')).toBe('report');
  });
});

describe('normalizeLabel', () => {
  it('should lower-case and keep only letters and digits', () => {
    expect(normalizeLabel('Haiti: Flood Update #3')).toBe('haitifloodupdate3');
    expect(normalizeLabel('!!!')).toBe('');
  });
});

describe('titleLabel', () => {
  it('should drop the first two segments when there are at least three', () => {
    expect(titleLabel('999_88_annual_flood_assessment_haiti.pdf')).toBe('annualfloodassessmenthaiti');
  });

  it('should use the whole stripped name otherwise', () => {
    expect(titleLabel('short_name.pdf')).toBe('shortname');
  });
});
