import { isValidCalendarDateTime } from '@extrato/types';
import { OfxParseError } from './errors.js';

// YYYYMMDD[HHMM[SS[.XXX]]][ [offset:TZ]]
const OFX_DATE = /^(\d{4})(\d{2})(\d{2})(?:(\d{2})(\d{2})(?:(\d{2})(?:\.\d{1,3})?)?)?\s*(?:\[[^\]]*\])?$/;

/**
 * Parse an OFX datetime into its calendar date (YYYY-MM-DD).
 *
 * The date is taken as written; a bracketed zone offset is accepted but not applied.
 */
export function parseOfxDate(raw: string, tag = 'DTPOSTED'): string {
  const match = raw.trim().match(OFX_DATE);
  if (match === null) {
    throw new OfxParseError(`Invalid <${tag}> value: "${raw}"`, tag);
  }
  const [, year = '', month = '', day = '', hour = '00', minute = '00', second = '00'] = match;
  const valid = isValidCalendarDateTime(
    Number(year),
    Number(month),
    Number(day),
    Number(hour),
    Number(minute),
    Number(second)
  );
  if (!valid) {
    throw new OfxParseError(`Invalid <${tag}> value: "${raw}"`, tag);
  }
  return `${year}-${month}-${day}`;
}

/**
 * Parse an OFX amount. A plain decimal is required; a lone comma is accepted as the
 * decimal separator ("-12,50").
 */
export function parseOfxAmount(raw: string, tag = 'TRNAMT'): number {
  const trimmed = raw.trim();
  let candidate = trimmed;
  if (/^[+-]?\d+,\d+$/.test(trimmed)) {
    candidate = trimmed.replace(',', '.');
  }
  if (!/^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/.test(candidate)) {
    throw new OfxParseError(`Invalid <${tag}> value: "${raw}"`, tag);
  }
  return Number(candidate);
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(value: string): string {
  return value.replace(/&(amp|lt|gt|quot|apos|nbsp);/g, (match: string, name: string) => ENTITIES[name] ?? match);
}
