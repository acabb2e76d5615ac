/**
 * Output module - renders extracted rows for spreadsheets and JSON consumers.
 */

export {
  exportRowsCsv,
  ROW_COLUMNS,
  type CsvExportOptions,
} from './csv-exporter.js';

export {
  buildExtractionOutput,
  computeChecksum,
  type ExtractionSummary,
} from './extraction-output.js';
