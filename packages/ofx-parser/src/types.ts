export type StatementKind = 'bank' | 'credit_card';

export interface OfxTransaction {
  /** TRNTYPE, lower-cased ("debit", "credit", "xfer", ...) */
  type: string;
  /** DTPOSTED as YYYY-MM-DD */
  datePosted: string;
  amount: number;
  fitId: string;
  memo: string;
  /** NAME, or PAYEE/NAME when the bank sends a payee aggregate */
  payee: string;
  checkNum: string;
  refNum: string;
}

export interface OfxAccount {
  kind: StatementKind;
  /** BANKID (routing / COMPE code); empty for credit card statements */
  bankId: string;
  branchId: string;
  accountId: string;
  accountType: string;
}

export interface OfxInstitution {
  org: string;
  fid: string;
}

export interface OfxStatement {
  currency: string;
  startDate: string | null;
  endDate: string | null;
  ledgerBalance: number | null;
  transactions: OfxTransaction[];
}

export interface OfxDocument {
  header: Record<string, string>;
  institution: OfxInstitution;
  account: OfxAccount;
  statement: OfxStatement;
}

/**
 * Anything that turns OFX bytes into a statement. Implementations throw on
 * structurally invalid input.
 */
export interface OfxParser {
  parse(data: Uint8Array | string): OfxDocument;
}
