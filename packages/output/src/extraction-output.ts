import { createHash } from 'crypto';
import {
  EXTRACTOR_NAME,
  EXTRACTOR_VERSION,
  ExtractionOutputSchema,
  OUTPUT_SCHEMA_VERSION,
  type ExtractionOutput,
  type ResolvedBank,
  type TransactionRow,
} from '@extrato/types';

/**
 * The parts of an extraction result the output document needs. Structurally
 * compatible with the extractor's ExtractionResult.
 */
export type ExtractionSummary =
  | { ok: true; rows: TransactionRow[]; bank: ResolvedBank; warnings: string[] }
  | { ok: false; error: string; warnings: string[] };

export function computeChecksum(raw: Uint8Array): string {
  return createHash('sha256').update(raw).digest('hex');
}

export function buildExtractionOutput(
  fileName: string,
  raw: Uint8Array,
  result: ExtractionSummary,
  extractedAt: Date = new Date()
): ExtractionOutput {
  const base = {
    schemaVersion: OUTPUT_SCHEMA_VERSION,
    source: { fileName, checksumSha256: computeChecksum(raw) },
    metadata: {
      extractor: { name: EXTRACTOR_NAME, version: EXTRACTOR_VERSION },
      extractedAt: extractedAt.toISOString(),
      warnings: [...result.warnings],
    },
  };

  if (result.ok) {
    return ExtractionOutputSchema.parse({ ...base, status: 'ok', bank: result.bank, rows: result.rows });
  }
  return ExtractionOutputSchema.parse({ ...base, status: 'failed', bank: null, rows: [], error: result.error });
}
