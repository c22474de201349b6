#!/usr/bin/env node
/**
 * table-merge CLI
 *
 * Commands:
 *   table-merge merge <base1> <base2>   - Merge two tables (default command)
 *   table-merge inspect <file>          - Show sheets, columns and the first rows
 *
 * Merge options:
 *   --sheet1 / --sheet2 <name>    - Sheet to read from a workbook (default: first)
 *   -k, --key <columns...>        - Key column(s) present in both tables
 *   -l, --left-key <columns...>   - Key column(s) of the first table
 *   -r, --right-key <columns...>  - Key column(s) of the second table
 *   --no-normalize                - Compare keys exactly as written
 *   --how <mode>                  - inner | left | right | outer (default: outer)
 *   -o, --output <path>           - Output file (default: merged_players.xlsx)
 *   --format <format>             - xlsx | csv | json (default: xlsx)
 *   --preview <rows>              - Rows to print after merging, 0 to skip
 */

import { writeFile } from 'fs/promises';
import { Command, Option } from 'commander';
import { EXPORT_FORMATS, MERGE_MODES } from './types';
import {
  DEFAULT_PREVIEW_ROWS,
  InspectCommandOptionsSchema,
  MergeCommandOptionsSchema,
  parseWith,
} from './config';
import { ExitCode, handleError, type ExitCodeValue } from './errors';
import { exportDataset, loadDataset } from './fileService';
import { resolveKeySelection } from './keys';
import { createLogger, type Logger } from './logger';
import { runMerge } from './mergeService';
import { formatPreview } from './preview';

export const VERSION = '1.0.0';

export const runMergeCommand = async (
  base1: string,
  base2: string,
  rawOptions: unknown,
  logger: Logger,
): Promise<ExitCodeValue> => {
  try {
    const options = parseWith(MergeCommandOptionsSchema, rawOptions);

    const [left, right] = await Promise.all([
      loadDataset(base1, options.sheet1),
      loadDataset(base2, options.sheet2),
    ]);
    for (const dataset of [left, right]) {
      const sheet = dataset.selectedSheet ? ` [${dataset.selectedSheet}]` : '';
      logger.info(`Loaded ${dataset.name}${sheet}: ${dataset.rowCount} rows, ${dataset.columns.length} columns`);
    }

    const selection = resolveKeySelection(
      left,
      right,
      options.leftKey ?? options.key,
      options.rightKey ?? options.key,
    );
    if (selection.guessed.length > 0) {
      logger.debug(`Suggested key: ${selection.guessed.join(', ')}`);
    }

    const result = runMerge(
      left,
      right,
      {
        leftKeys: selection.leftKeys,
        rightKeys: selection.rightKeys,
        normalize: options.normalize,
        how: options.how,
        indicator: options.indicator,
        normalization: {
          toLowerCase: !options.keepCase,
          trimWhitespace: !options.keepWhitespace,
          removeAccents: !options.keepAccents,
          removeSpecialChars: options.stripSpecial,
          removeNumbers: options.stripNumbers,
        },
      },
      logger.child('merge'),
    );

    if (options.preview > 0) {
      logger.log(formatPreview(result.dataset, options.preview));
    }

    const artifact = exportDataset(result.dataset, options.format);
    const target = options.output ?? artifact.fileName;
    await writeFile(target, artifact.data);
    logger.success(`Wrote ${target} (${artifact.mimeType})`);
    return ExitCode.SUCCESS;
  } catch (error) {
    return handleError(error, logger);
  }
};

export const runInspectCommand = async (
  file: string,
  rawOptions: unknown,
  logger: Logger,
): Promise<ExitCodeValue> => {
  try {
    const options = parseWith(InspectCommandOptionsSchema, rawOptions);
    const dataset = await loadDataset(file, options.sheet);

    if (dataset.sheets) {
      logger.log(`Sheets: ${dataset.sheets.join(', ')} (selected: ${dataset.selectedSheet ?? '-'})`);
    }
    logger.log(`Columns: ${dataset.columns.map(c => `${c.name} <${c.type}>`).join(', ')}`);
    logger.log(formatPreview(dataset, options.rows));
    return ExitCode.SUCCESS;
  } catch (error) {
    return handleError(error, logger);
  }
};

export const createProgram = (logger: Logger = createLogger('cli')): Command => {
  const program = new Command()
    .name('table-merge')
    .description('Merge two spreadsheet or CSV tables on matching key columns')
    .version(VERSION, '-v, --version', 'Show version number');

  program
    .command('merge', { isDefault: true })
    .description('Merge two tables and write the result')
    .argument('<base1>', 'First table (Excel or CSV)')
    .argument('<base2>', 'Second table (Excel or CSV)')
    .option('--sheet1 <name>', 'Sheet of the first workbook')
    .option('--sheet2 <name>', 'Sheet of the second workbook')
    .option('-k, --key <columns...>', 'Key column(s) present in both tables')
    .option('-l, --left-key <columns...>', 'Key column(s) of the first table')
    .option('-r, --right-key <columns...>', 'Key column(s) of the second table')
    .option('--no-normalize', 'Compare keys exactly as written')
    .option('--keep-case', 'Do not lower-case keys')
    .option('--keep-accents', 'Do not strip accents from keys')
    .option('--keep-whitespace', 'Do not trim keys')
    .option('--strip-special', 'Remove punctuation and symbols from keys')
    .option('--strip-numbers', 'Remove digits from keys')
    .addOption(new Option('--how <mode>', 'Join type').choices([...MERGE_MODES]).default('outer'))
    .option('--indicator', 'Add a _merge column telling where each row came from')
    .option('-o, --output <path>', 'Output file')
    .addOption(new Option('--format <format>', 'Output format').choices([...EXPORT_FORMATS]).default('xlsx'))
    .option('--preview <rows>', `Rows to print after merging, 0 to skip (default: ${DEFAULT_PREVIEW_ROWS})`)
    .action(async (base1: string, base2: string, options: Record<string, unknown>) => {
      process.exitCode = await runMergeCommand(base1, base2, options, logger);
    });

  program
    .command('inspect')
    .description('Show the sheets, columns and first rows of a file')
    .argument('<file>', 'Excel or CSV file')
    .option('--sheet <name>', 'Sheet to read from a workbook')
    .option('--rows <rows>', `Rows to print (default: ${DEFAULT_PREVIEW_ROWS})`)
    .action(async (file: string, options: Record<string, unknown>) => {
      process.exitCode = await runInspectCommand(file, options, logger);
    });

  return program;
};

if (typeof require !== 'undefined' && require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = ExitCode.ERROR;
    });
}
