#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { resolve, dirname, basename } from 'path';
import {
  EXTRACTOR_VERSION,
  createConsoleLogger,
  validateExtractionOutputOrThrow,
  type ExtractionOutput,
  type Logger,
  type TransactionRow,
} from '@extrato/types';
import { loadBankDirectory, type BankDirectory } from '@extrato/banks';
import {
  extractOfx,
  processBatch,
  scanDirectoryForOfx,
  validateDirectory,
  type FileError,
} from '@extrato/extractor';
import { buildExtractionOutput, exportRowsCsv } from '@extrato/output';

const AVAILABLE_FORMATS = ['json', 'csv'] as const;
type OutputFormat = typeof AVAILABLE_FORMATS[number];

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface CliOptions {
  inputDir?: string;
  out?: string;
  format: string;
  banks?: string;
  verbose: boolean;
  pretty: boolean;
  dumpNormalized: boolean;
}

function isOutputFormat(value: string): value is OutputFormat {
  return AVAILABLE_FORMATS.some((format) => format === value);
}

function resolveFormat(value: string): OutputFormat {
  const format = value.toLowerCase();
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid format: "${value}". Available formats: ${AVAILABLE_FORMATS.join(', ')}`);
  }
  return format;
}

async function writeOutput(content: string, outPath: string | undefined, logger: Logger): Promise<void> {
  if (outPath === undefined) {
    process.stdout.write(content);
    return;
  }
  const resolved = resolve(outPath);
  await mkdir(dirname(resolved), { recursive: true });
  await writeFile(resolved, content, 'utf-8');
  logger.info(`Output written to: ${resolved}`);
}

function renderJson(payload: ExtractionOutput | ExtractionOutput[], pretty: boolean): string {
  return JSON.stringify(payload, null, pretty ? 2 : undefined) + '\n';
}

program
  .name('extrato')
  .description('Repair bank OFX exports and extract their transactions as rows')
  .version(EXTRACTOR_VERSION)
  .argument('[ofx-file]', 'Path to the OFX statement')
  .option('-d, --inputDir <directory>', 'Directory containing multiple OFX files to process', process.env['EXTRATO_INPUT_DIR'])
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['EXTRATO_OUTPUT_FILE'])
  .option(
    '-f, --format <format>',
    `Output format (${AVAILABLE_FORMATS.join(', ')})`,
    process.env['EXTRATO_FORMAT'] ?? 'json'
  )
  .option('-b, --banks <file>', 'JSON bank table (default: bundled COMPE table)', process.env['EXTRATO_BANKS_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('EXTRATO_VERBOSE', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('EXTRATO_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option(
    '--dump-normalized',
    'Write the normalized OFX next to the input as <file>.normalized.ofx (single file mode)',
    envBool('EXTRATO_DUMP_NORMALIZED', false)
  )
  .action(async (ofxFile: string | undefined, options: CliOptions) => {
    try {
      const format = resolveFormat(options.format);
      const logger = createConsoleLogger({ verbose: options.verbose });
      const banks = loadBankDirectory(options.banks);
      logger.info(`Bank table: ${banks.size} bank(s)`);

      if (options.inputDir !== undefined) {
        await processDirectory(options.inputDir, format, banks, logger, options);
      } else if (ofxFile !== undefined) {
        await processSingleFile(ofxFile, format, banks, logger, options);
      } else {
        console.error('[ERROR] Either an OFX file or --inputDir must be specified');
        process.exit(1);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

/**
 * Extract a single OFX file
 */
async function processSingleFile(
  ofxFile: string,
  format: OutputFormat,
  banks: BankDirectory,
  logger: Logger,
  options: CliOptions
): Promise<void> {
  const filePath = resolve(ofxFile);
  logger.info(`Reading: ${filePath}`);
  const raw = await readFile(filePath);

  const dump: { text?: string } = {};
  const result = extractOfx(raw, {
    banks,
    logger,
    dumpNormalized: options.dumpNormalized ? (text) => { dump.text = text; } : undefined,
  });

  if (dump.text !== undefined) {
    const dumpPath = `${filePath}.normalized.ofx`;
    await writeFile(dumpPath, dump.text, 'utf-8');
    logger.info(`Normalized OFX written to: ${dumpPath}`);
  }

  if (format === 'csv') {
    await writeOutput(exportRowsCsv(result.rows), options.out, logger);
  } else {
    const output = buildExtractionOutput(basename(filePath), raw, result);
    validateExtractionOutputOrThrow(output);
    await writeOutput(renderJson(output, options.pretty), options.out, logger);
  }

  if (!result.ok) {
    console.error(`[WARN] No data extracted from ${basename(filePath)}`);
    process.exitCode = 1;
  }
}

/**
 * Extract every OFX file of a directory
 */
async function processDirectory(
  inputDir: string,
  format: OutputFormat,
  banks: BankDirectory,
  logger: Logger,
  options: CliOptions
): Promise<void> {
  const dirPath = resolve(inputDir);
  logger.info(`Batch mode: scanning directory ${dirPath}`);

  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    console.error(`[ERROR] ${validation.error}`);
    process.exit(1);
  }

  const scanResult = await scanDirectoryForOfx(dirPath);
  for (const skip of scanResult.skipped) {
    logger.info(`Skipped ${skip.fileName}: ${skip.reason}`);
  }
  if (scanResult.files.length === 0) {
    console.error('[ERROR] No OFX files found in directory');
    process.exit(1);
  }

  const result = await processBatch(scanResult.files, {
    banks,
    logger,
    onProgress: (current, total, fileName) => {
      logger.info(`Extracting ${current}/${total}: ${fileName}`);
    },
    onError: (error: FileError) => {
      console.error(`[WARN] No data extracted from ${error.fileName}: ${error.error}`);
    },
  });

  console.error('');
  console.error('=== Batch Summary ===');
  console.error(`OFX files found:   ${result.summary.filesFound}`);
  console.error(`Files succeeded:   ${result.summary.filesSucceeded}`);
  console.error(`Files failed:      ${result.summary.filesFailed}`);
  console.error(`Rows extracted:    ${result.summary.totalRows}`);

  if (format === 'csv') {
    const rows: TransactionRow[] = result.extractions.flatMap(({ result: extraction }) => extraction.rows);
    await writeOutput(exportRowsCsv(rows), options.out, logger);
  } else {
    const outputs: ExtractionOutput[] = [];
    for (const { file, raw, result: extraction } of result.extractions) {
      const output = buildExtractionOutput(file.fileName, raw, extraction);
      validateExtractionOutputOrThrow(output);
      outputs.push(output);
    }
    await writeOutput(renderJson(outputs, options.pretty), options.out, logger);
  }

  if (result.summary.filesSucceeded === 0) {
    process.exitCode = 1;
  }
}

await program.parseAsync();
