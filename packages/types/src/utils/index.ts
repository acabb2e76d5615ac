export {
  EXTRACTOR_NAME,
  EXTRACTOR_VERSION,
  OUTPUT_SCHEMA_VERSION,
  UNKNOWN_BANK_NAME,
  DEFAULT_HEADER_SCAN_BYTES,
} from './constants.js';
export {
  isLeapYear,
  daysInMonth,
  isValidCalendarDateTime,
  formatDisplayDate,
} from './date.js';
export { formatBrazilianAmount } from './money.js';
export { createConsoleLogger, silentLogger, type Logger, type ConsoleLoggerOptions } from './logger.js';
