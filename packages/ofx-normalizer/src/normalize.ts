import { normalizeHeader } from './header.js';
import { normalizeDates, type InvalidDate } from './dates.js';
import { filterTransactions } from './transactions.js';
import { normalizeAmounts } from './amounts.js';

export interface NormalizationReport {
  headerInserted: boolean;
  invalidDates: InvalidDate[];
  removedTransactions: number;
}

export interface NormalizedOfx {
  text: string;
  report: NormalizationReport;
}

/**
 * Run the textual repairs in their fixed order: header, dates, transaction filter,
 * amounts. None of them throws; what each one changed is returned in the report.
 */
export function normalizeOfx(decoded: string): NormalizedOfx {
  const invalidDates: InvalidDate[] = [];

  const header = normalizeHeader(decoded);
  const withDates = normalizeDates(header.text, (invalid) => invalidDates.push(invalid));
  const filtered = filterTransactions(withDates);
  const text = normalizeAmounts(filtered.text);

  return {
    text,
    report: {
      headerInserted: header.headerInserted,
      invalidDates,
      removedTransactions: filtered.removed,
    },
  };
}
