/**
 * CSV Exporter Module
 *
 * Writes transaction rows as delimited text for spreadsheet import.
 */

import type { TransactionRow } from '@extrato/types';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ';', since amounts use ',' for cents) */
  delimiter?: string;
  /** Line separator (default: '\n') */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Column headers in display order, paired with the row field they show
 */
export const ROW_COLUMNS = [
  ['Data', 'date'],
  ['Histórico', 'description'],
  ['Documento', 'documentNumber'],
  ['Valor', 'amount'],
  ['Débito/Crédito', 'debitCredit'],
  ['Origem/Destino', 'counterparty'],
  ['Banco', 'bankName'],
] as const satisfies ReadonlyArray<readonly [string, keyof TransactionRow]>;

/**
 * Escape a value for CSV (handles quotes, delimiters and line breaks)
 */
function escapeCsvValue(value: string, delimiter: string): string {
  const needsQuoting = value.includes(delimiter) ||
                       value.includes('"') ||
                       value.includes('\n') ||
                       value.includes('\r');

  if (needsQuoting) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

export function exportRowsCsv(rows: readonly TransactionRow[], options: CsvExportOptions = {}): string {
  const delimiter = options.delimiter ?? ';';
  const lineEnding = options.lineEnding ?? '\n';
  const lines: string[] = [];

  if (options.includeHeader ?? true) {
    lines.push(ROW_COLUMNS.map(([header]) => escapeCsvValue(header, delimiter)).join(delimiter));
  }

  for (const row of rows) {
    lines.push(ROW_COLUMNS.map(([, field]) => escapeCsvValue(row[field], delimiter)).join(delimiter));
  }

  return lines.length === 0 ? '' : lines.join(lineEnding) + lineEnding;
}
