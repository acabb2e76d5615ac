import {
  DEFAULT_HEADER_SCAN_BYTES,
  silentLogger,
  type Logger,
  type ResolvedBank,
  type TransactionRow,
} from '@extrato/types';
import { decodeOfxBytes, normalizeOfx, CANONICAL_OFX_HEADER, type DecodedEncoding } from '@extrato/ofx-normalizer';
import { createOfxParser, type OfxDocument, type OfxParser } from '@extrato/ofx-parser';
import type { BankDirectory } from '@extrato/banks';
import { resolveBank } from './bank-resolver.js';
import { toTransactionRows } from './row-mapper.js';

export interface ExtractOptions {
  banks: BankDirectory;
  /** OFX parser collaborator (default: the bundled strict parser) */
  parser?: OfxParser;
  /** Diagnostic channel for fallbacks and failures (default: silent) */
  logger?: Logger;
  /** Bytes searched for ENCODING:UTF-8 before parsing (default: 512) */
  headerScanBytes?: number;
  unknownBankName?: string;
  /** Receives the normalized text before it is parsed */
  dumpNormalized?: (text: string) => void;
}

interface ExtractionBase {
  encoding: DecodedEncoding;
  warnings: string[];
}

export interface ExtractionSuccess extends ExtractionBase {
  ok: true;
  rows: TransactionRow[];
  bank: ResolvedBank;
  statement: OfxDocument;
}

export interface ExtractionFailure extends ExtractionBase {
  ok: false;
  rows: [];
  error: string;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

const UTF8_HEADER_TOKEN = 'ENCODING:UTF-8';

const encoder = new TextEncoder();
const scanDecoder = new TextDecoder('utf-8');

/**
 * Make sure the bytes handed to the parser declare UTF-8 within the first
 * `scanBytes` bytes, prepending the canonical header when they do not.
 */
export function ensureUtf8Header(
  bytes: Uint8Array,
  scanBytes: number = DEFAULT_HEADER_SCAN_BYTES
): { bytes: Uint8Array; prepended: boolean } {
  const prefix = scanDecoder.decode(bytes.subarray(0, scanBytes));
  if (prefix.includes(UTF8_HEADER_TOKEN)) {
    return { bytes, prepended: false };
  }
  const header = encoder.encode(CANONICAL_OFX_HEADER);
  const combined = new Uint8Array(header.length + bytes.length);
  combined.set(header, 0);
  combined.set(bytes, header.length);
  return { bytes: combined, prepended: true };
}

/**
 * Decode, repair, parse and flatten one OFX document.
 *
 * Normalization never fails. A parser or row mapping failure is logged with its stack
 * and turns the whole document into a failed result with no rows.
 */
export function extractOfx(raw: Uint8Array, options: ExtractOptions): ExtractionResult {
  const logger = options.logger ?? silentLogger;
  const parser = options.parser ?? createOfxParser();
  const warnings: string[] = [];
  const warn = (message: string): void => {
    warnings.push(message);
    logger.warn(message);
  };

  const decoded = decodeOfxBytes(raw);
  if (decoded.fallback) {
    warn('File is not valid UTF-8; decoded as Latin-1');
  }

  const normalized = normalizeOfx(decoded.text);
  const { report } = normalized;
  if (report.headerInserted) {
    warn('No OFX header found; inserted the canonical header');
  }
  for (const invalid of report.invalidDates) {
    warn(`Invalid date <${invalid.tag}>${invalid.value} left unchanged`);
  }
  if (report.removedTransactions > 0) {
    warn(`Removed ${report.removedTransactions} transaction(s) without TRNAMT or FITID`);
  }
  logger.debug(`Normalized OFX: ${normalized.text.length} characters`);
  options.dumpNormalized?.(normalized.text);

  const checked = ensureUtf8Header(encoder.encode(normalized.text), options.headerScanBytes);
  if (checked.prepended) {
    warn(`${UTF8_HEADER_TOKEN} not found in header; prepended the canonical header`);
  }

  let statement: OfxDocument;
  try {
    statement = parser.parse(checked.bytes);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`OFX parsing failed: ${message}`, error);
    return { ok: false, rows: [], error: message, encoding: decoded.encoding, warnings };
  }

  let bank: ResolvedBank;
  let rows: TransactionRow[];
  try {
    bank = resolveBank(statement.account, normalized.text, {
      banks: options.banks,
      unknownBankName: options.unknownBankName,
      logger: {
        debug: (message) => logger.debug(message),
        info: (message) => logger.info(message),
        warn,
        error: (message, error) => logger.error(message, error),
      },
    });
    rows = toTransactionRows(statement.statement.transactions, bank.name);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Row mapping failed: ${message}`, error);
    return { ok: false, rows: [], error: message, encoding: decoded.encoding, warnings };
  }

  logger.info(`Extracted ${rows.length} transaction(s) from ${bank.name}`);

  return { ok: true, rows, bank, statement, encoding: decoded.encoding, warnings };
}
