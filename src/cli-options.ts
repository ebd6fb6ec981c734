/**
 * Command-line argument parsing for the merge CLI
 *
 * @module cli-options
 */

import { z } from 'zod';
import { ValidationError, validateInput } from './utils/validation.js';

export const USAGE = `Usage:
  pdf-report-merge <job-folder> [--max-concurrent N]
  pdf-report-merge <source.json> <pdf-dir> <output.json> [--max-concurrent N]`;

const MaxConcurrentSchema = z.coerce.number().int().min(1).max(16);

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'folder'; folderPath: string; maxConcurrent?: number }
  | {
      kind: 'explicit';
      sourceJsonPath: string;
      pdfDirectory: string;
      outputJsonPath: string;
      maxConcurrent?: number;
    };

/**
 * Parse argv (without the node and script entries)
 *
 * @throws ValidationError on unknown flags or a wrong number of positionals
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const positionals: string[] = [];
  let maxConcurrent: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (arg === '--max-concurrent') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ValidationError('--max-concurrent needs a value');
      }
      maxConcurrent = validateInput(MaxConcurrentSchema, value);
      i++;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new ValidationError(`Unknown option: ${arg}`);
    }
    positionals.push(arg);
  }

  if (positionals.length === 1) {
    return { kind: 'folder', folderPath: positionals[0], maxConcurrent };
  }
  if (positionals.length === 3) {
    const [sourceJsonPath, pdfDirectory, outputJsonPath] = positionals;
    return { kind: 'explicit', sourceJsonPath, pdfDirectory, outputJsonPath, maxConcurrent };
  }
  throw new ValidationError(`Expected 1 or 3 arguments, got ${positionals.length}`);
}
