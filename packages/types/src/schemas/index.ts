export {
  TransactionRowSchema,
  BankEntrySchema,
  BankTableSchema,
  ExtractionOutputSchema,
} from './extraction.js';

export type {
  DebitCreditFlag,
  TransactionRow,
  BankEntry,
  BankSource,
  ResolvedBank,
  ExtractionMetadata,
  ExtractionOutput,
} from './extraction.js';

export {
  getOutputSchemaPath,
  getOutputSchema,
  validateExtractionOutput,
  validateExtractionOutputOrThrow,
} from './schema-registry.js';

export type { ValidationResult, ValidationError } from './schema-registry.js';
