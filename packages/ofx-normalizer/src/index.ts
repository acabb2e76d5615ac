export { decodeOfxBytes, type DecodeResult, type DecodedEncoding } from './encoding.js';

export {
  normalizeHeader,
  normalizeLineEndings,
  parseHeaderLine,
  CANONICAL_OFX_HEADER,
  CANONICAL_OFX_HEADER_FIELDS,
  type HeaderField,
  type HeaderNormalization,
} from './header.js';

export { normalizeDates, OFX_DATE_TAGS, type OfxDateTag, type InvalidDate } from './dates.js';

export { filterTransactions, isTransactionBlockUsable, type TransactionFilterResult } from './transactions.js';

export { normalizeAmounts, stripAmountDecoration, ungroupAmount, BR_GROUPED_AMOUNT } from './amounts.js';

export { normalizeOfx, type NormalizationReport, type NormalizedOfx } from './normalize.js';
