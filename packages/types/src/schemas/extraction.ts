import { z } from 'zod';

export const DebitCreditFlagSchema = z.enum(['D', 'C']);
export type DebitCreditFlag = z.infer<typeof DebitCreditFlagSchema>;

export const TransactionRowSchema = z.object({
  date: z.string().regex(/^\d{2}\/\d{2}\/\d{4}$/, 'Date must be in DD/MM/YYYY format'),
  description: z.string(),
  documentNumber: z.string(),
  amount: z.string().regex(/^\d{1,3}(\.\d{3})*,\d{2}$/, 'Amount must be in 1.234,56 format'),
  debitCredit: DebitCreditFlagSchema,
  counterparty: z.string(),
  bankName: z.string(),
});
export type TransactionRow = z.infer<typeof TransactionRowSchema>;

export const BankEntrySchema = z.object({
  code: z.string().regex(/^\d+$/, 'Bank code must contain only digits'),
  name: z.string().min(1),
});
export type BankEntry = z.infer<typeof BankEntrySchema>;

export const BankTableSchema = z.array(BankEntrySchema);

export const BankSourceSchema = z.enum(['lookup', 'org', 'unknown']);
export type BankSource = z.infer<typeof BankSourceSchema>;

export const ResolvedBankSchema = z.object({
  code: z.string().nullable(),
  name: z.string().min(1),
  source: BankSourceSchema,
});
export type ResolvedBank = z.infer<typeof ResolvedBankSchema>;

export const ExtractionMetadataSchema = z.object({
  extractor: z.object({
    name: z.string(),
    version: z.string(),
  }),
  extractedAt: z.string().datetime(),
  warnings: z.array(z.string()),
});
export type ExtractionMetadata = z.infer<typeof ExtractionMetadataSchema>;

export const ExtractionOutputSchema = z.object({
  schemaVersion: z.literal('1.0.0'),
  source: z.object({
    fileName: z.string().min(1),
    checksumSha256: z.string().regex(/^[a-f0-9]{64}$/),
  }),
  status: z.enum(['ok', 'failed']),
  bank: ResolvedBankSchema.nullable(),
  rows: z.array(TransactionRowSchema),
  error: z.string().optional(),
  metadata: ExtractionMetadataSchema,
});
export type ExtractionOutput = z.infer<typeof ExtractionOutputSchema>;
