// Orchestrator
export {
  extractOfx,
  ensureUtf8Header,
  type ExtractOptions,
  type ExtractionResult,
  type ExtractionSuccess,
  type ExtractionFailure,
} from './extract.js';

// Bank identification
export { resolveBank, findBankCode, findOrgName, type BankResolutionOptions } from './bank-resolver.js';

// Row mapping
export { toTransactionRow, toTransactionRows, toDebitCreditFlag } from './row-mapper.js';

// Batch processor
export {
  processBatch,
  type FileError,
  type FileExtraction,
  type BatchProcessResult,
  type BatchProcessOptions,
} from './batch-processor.js';

// Directory scanner
export {
  scanDirectoryForOfx,
  validateDirectory,
  OFX_EXTENSIONS,
  type OfxFileInfo,
  type ScanResult,
  type ScanOptions,
  type SkippedFile,
  type DirectoryCheck,
} from './directory-scanner.js';
