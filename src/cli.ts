#!/usr/bin/env node
/* eslint-disable no-console */
/**
 * PDF Report Merge - command line
 *
 * Processes one job folder synchronously and prints the summary.
 *
 * Usage:
 *   pdf-report-merge ./reliefweb_data/haiti_flood_2023
 *   pdf-report-merge source_reports.json pdfs/ out_reports_full_text.json
 */

import { USAGE, parseCliArgs } from './cli-options.js';
import { applyStartupConfig, loadEnvFile } from './server/startup.js';
import { resolveJobFolder } from './services/processing/folders.js';
import { ReportProcessor, type ProcessOptions } from './services/processing/processor.js';

const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  loadEnvFile();
  const config = applyStartupConfig(
    command.maxConcurrent !== undefined ? { maxConcurrent: command.maxConcurrent } : undefined
  );

  let options: ProcessOptions;
  if (command.kind === 'folder') {
    const paths = resolveJobFolder(command.folderPath);
    options = {
      sourceJsonPath: paths.sourceJsonPath,
      pdfDirectory: paths.pdfDirectory,
      outputJsonPath: paths.outputJsonPath,
    };
  } else {
    options = {
      sourceJsonPath: command.sourceJsonPath,
      pdfDirectory: command.pdfDirectory,
      outputJsonPath: command.outputJsonPath,
    };
  }

  const processor = new ReportProcessor({ maxConcurrent: config.maxConcurrent });
  const summary = await processor.process(options);

  const stats = summary.matching_statistics;
  console.log('');
  console.log(bold('  Processing complete'));
  console.log(`  ${green('Output')}            ${summary.output_path}`);
  console.log(`  Articles          ${summary.total_articles}`);
  console.log(`    with PDF        ${summary.articles_with_pdf}`);
  console.log(`    without PDF     ${summary.articles_without_pdf}`);
  console.log(`  PDFs processed    ${summary.total_pdfs_processed}`);
  console.log(
    dim(
      `  exact=${stats.exact_match} partial=${stats.partial_match} id=${stats.id_match} ` +
        `reliefweb_id=${stats.reliefweb_id_match} title=${stats.title_match} none=${stats.no_match}`
    )
  );
  if (summary.extraction_warnings > 0) {
    console.log(`  ${red('Warnings')}          ${summary.extraction_warnings}`);
  }
  console.log('');
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`${red('Error:')} ${message}`);
    console.error(USAGE);
    process.exit(1);
  });
