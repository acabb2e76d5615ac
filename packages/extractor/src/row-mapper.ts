import {
  formatBrazilianAmount,
  formatDisplayDate,
  TransactionRowSchema,
  type TransactionRow,
} from '@extrato/types';
import type { OfxTransaction } from '@extrato/ofx-parser';

export function toDebitCreditFlag(type: string): 'D' | 'C' {
  return type.toLowerCase() === 'debit' ? 'D' : 'C';
}

/**
 * Map one parsed transaction to its display row. Throws when the date or amount
 * cannot be rendered, or when the row breaks the display formats.
 */
export function toTransactionRow(transaction: OfxTransaction, bankName: string): TransactionRow {
  return TransactionRowSchema.parse({
    date: formatDisplayDate(transaction.datePosted),
    description: transaction.memo !== '' ? transaction.memo : transaction.payee,
    documentNumber: transaction.checkNum,
    amount: formatBrazilianAmount(Math.abs(transaction.amount)),
    debitCredit: toDebitCreditFlag(transaction.type),
    counterparty: transaction.payee,
    bankName,
  });
}

/**
 * Flatten parsed transactions into display rows, keeping the statement order.
 */
export function toTransactionRows(transactions: readonly OfxTransaction[], bankName: string): TransactionRow[] {
  return transactions.map((transaction) => toTransactionRow(transaction, bankName));
}
