/**
 * Amount (TRNAMT) normalization.
 *
 * Two independent rewrites, applied in order:
 * 1. a trailing `*` after the number is dropped (`14.409.33*`);
 * 2. Brazilian thousands grouping with a dot as decimal separator is collapsed
 *    (`63.592.70` -> `63592.70`).
 */

/** One to three digits, one or more `.ddd` groups, then `.dd` */
export const BR_GROUPED_AMOUNT = /^-?\d{1,3}(?:\.\d{3})+\.\d{2}$/;

const DECORATED_AMOUNT = /(<TRNAMT>[^<\n]*?)[ \t]*\*(?=[ \t]*(?:<|\r?\n|$))/g;

const AMOUNT_VALUE = /<TRNAMT>([^<\n]+)/g;

export function stripAmountDecoration(text: string): string {
  return text.replace(DECORATED_AMOUNT, '$1');
}

/**
 * Collapse a grouped amount to a plain decimal. Returns null when the value is not
 * in the grouped shape; `1234.56` and `-12.50` stay as they are.
 */
export function ungroupAmount(value: string): string | null {
  const trimmed = value.trim();
  if (!BR_GROUPED_AMOUNT.test(trimmed)) {
    return null;
  }
  const lastDot = trimmed.lastIndexOf('.');
  const integerPart = trimmed.slice(0, lastDot).replace(/\./g, '');
  return `${integerPart}.${trimmed.slice(lastDot + 1)}`;
}

export function normalizeAmounts(text: string): string {
  return stripAmountDecoration(text).replace(AMOUNT_VALUE, (match: string, value: string) => {
    const ungrouped = ungroupAmount(value);
    return ungrouped === null ? match : `<TRNAMT>${ungrouped}`;
  });
}
