import { isValidCalendarDateTime } from '@extrato/types';

export const OFX_DATE_TAGS = [
  'DTSERVER',
  'DTACCTUP',
  'DTSTART',
  'DTEND',
  'DTPOSTED',
  'DTUSER',
  'DTAVAIL',
  'DTASOF',
] as const;

export type OfxDateTag = typeof OFX_DATE_TAGS[number];

export interface InvalidDate {
  tag: string;
  value: string;
}

// <DTPOSTED>15/03/2021 10:30:00
const LOCALIZED_DATE = new RegExp(
  `<(${OFX_DATE_TAGS.join('|')})>\\s*(\\d{2})/(\\d{2})/(\\d{4})\\s+(\\d{2}):(\\d{2}):(\\d{2})`,
  'g'
);

/**
 * Rewrite `DD/MM/YYYY HH:MM:SS` date values into the OFX `YYYYMMDDHHMMSS` form.
 *
 * Only values of that exact shape are touched. A value that has the shape but is not
 * a real calendar instant (day 32, hour 25) is left as it is and reported to
 * `onInvalid`.
 */
export function normalizeDates(text: string, onInvalid?: (invalid: InvalidDate) => void): string {
  return text.replace(
    LOCALIZED_DATE,
    (match: string, tag: string, day: string, month: string, year: string, hour: string, minute: string, second: string) => {
      const valid = isValidCalendarDateTime(
        Number(year),
        Number(month),
        Number(day),
        Number(hour),
        Number(minute),
        Number(second)
      );
      if (!valid) {
        onInvalid?.({ tag, value: `${day}/${month}/${year} ${hour}:${minute}:${second}` });
        return match;
      }
      return `<${tag}>${year}${month}${day}${hour}${minute}${second}`;
    }
  );
}
