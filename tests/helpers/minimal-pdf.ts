/**
 * Builds small uncompressed PDFs for reader tests.
 *
 * @module tests/helpers/minimal-pdf
 */

export interface TextRun {
  text: string;
  x: number;
  y: number;
}

function escapePdfString(text: string): string {
  return text.replace(/[\\()]/g, (ch) => `\\${ch}`);
}

/**
 * Content stream drawing each run at its absolute position in 12pt Helvetica
 */
export function textContent(runs: readonly TextRun[]): string {
  const ops = runs.map((run) => `1 0 0 1 ${run.x} ${run.y} Tm (${escapePdfString(run.text)}) Tj`);
  return ['BT', '/F1 12 Tf', ...ops, 'ET'].join('\n');
}

/**
 * One US Letter page per content stream, with a valid xref table
 */
export function buildPdf(pageContents: readonly string[]): Buffer {
  const objects: string[] = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pageContents.map((_, i) => `${4 + i * 2} 0 R`).join(' ')}] /Count ${pageContents.length} >>`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];
  pageContents.forEach((content, i) => {
    objects.push(
      '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ' +
        `/Resources << /Font << /F1 3 0 R >> >> /Contents ${5 + i * 2} 0 R >>`
    );
    objects.push(`<< /Length ${Buffer.byteLength(content, 'latin1')} >>\nstream\n${content}\nendstream`);
  });

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(Buffer.byteLength(body, 'latin1'));
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(body, 'latin1');
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}
