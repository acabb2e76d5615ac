import { OfxParseError } from './errors.js';
import { parseOfxBody, findChild, findFirst, childValue, type OfxElement } from './sgml.js';
import { parseOfxAmount, parseOfxDate } from './values.js';
import type {
  OfxAccount,
  OfxDocument,
  OfxInstitution,
  OfxParser,
  OfxStatement,
  OfxTransaction,
  StatementKind,
} from './types.js';

const utf8Decoder = new TextDecoder('utf-8');

function parseHeaderRegion(region: string): Record<string, string> {
  const header: Record<string, string> = {};
  for (const line of region.split(/\r?\n|\r/)) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const key = line.slice(0, colon).trim().toUpperCase();
    if (key !== '') {
      header[key] = line.slice(colon + 1).trim();
    }
  }
  return header;
}

function parseInstitution(ofx: OfxElement): OfxInstitution {
  const fi = findFirst(ofx, 'FI');
  return {
    org: fi !== undefined ? childValue(fi, 'ORG') : '',
    fid: fi !== undefined ? childValue(fi, 'FID') : '',
  };
}

function parseAccount(statement: OfxElement, kind: StatementKind): OfxAccount {
  const from = findChild(statement, kind === 'bank' ? 'BANKACCTFROM' : 'CCACCTFROM');
  if (from === undefined) {
    return { kind, bankId: '', branchId: '', accountId: '', accountType: '' };
  }
  return {
    kind,
    bankId: childValue(from, 'BANKID'),
    branchId: childValue(from, 'BRANCHID'),
    accountId: childValue(from, 'ACCTID'),
    accountType: childValue(from, 'ACCTTYPE'),
  };
}

function requiredValue(element: OfxElement, name: string): string {
  const value = childValue(element, name);
  if (value === '') {
    throw new OfxParseError(`Missing <${name}> in <${element.name}>`, name);
  }
  return value;
}

function parseTransaction(trn: OfxElement): OfxTransaction {
  const fitId = requiredValue(trn, 'FITID');
  const datePosted = parseOfxDate(requiredValue(trn, 'DTPOSTED'), 'DTPOSTED');
  const amount = parseOfxAmount(requiredValue(trn, 'TRNAMT'), 'TRNAMT');

  const payeeAggregate = findChild(trn, 'PAYEE');
  const name = childValue(trn, 'NAME');
  const payee = name !== '' ? name : payeeAggregate !== undefined ? childValue(payeeAggregate, 'NAME') : '';

  const trnType = childValue(trn, 'TRNTYPE');

  return {
    type: trnType !== '' ? trnType.toLowerCase() : 'other',
    datePosted,
    amount,
    fitId,
    memo: childValue(trn, 'MEMO'),
    payee,
    checkNum: childValue(trn, 'CHECKNUM'),
    refNum: childValue(trn, 'REFNUM'),
  };
}

function optionalDate(element: OfxElement, name: string): string | null {
  const raw = childValue(element, name);
  return raw === '' ? null : parseOfxDate(raw, name);
}

function parseStatement(statement: OfxElement): OfxStatement {
  const tranList = findChild(statement, 'BANKTRANLIST');
  const ledger = findChild(statement, 'LEDGERBAL');
  const balance = ledger !== undefined ? childValue(ledger, 'BALAMT') : '';

  const transactions = tranList === undefined
    ? []
    : tranList.children.filter((child) => child.name === 'STMTTRN').map(parseTransaction);

  return {
    currency: childValue(statement, 'CURDEF'),
    startDate: tranList !== undefined ? optionalDate(tranList, 'DTSTART') : null,
    endDate: tranList !== undefined ? optionalDate(tranList, 'DTEND') : null,
    ledgerBalance: balance !== '' ? parseOfxAmount(balance, 'BALAMT') : null,
    transactions,
  };
}

/**
 * Parse an OFX 1.x (SGML) or 2.x (XML) document holding a bank or credit card
 * statement. Only the first statement of the file is read.
 *
 * @throws OfxParseError when the structure or a required transaction field is invalid
 */
export function parseOfx(data: Uint8Array | string): OfxDocument {
  const text = typeof data === 'string' ? data : utf8Decoder.decode(data);
  const bodyStart = text.indexOf('<');
  if (bodyStart === -1) {
    throw new OfxParseError('No OFX markup found', 'OFX');
  }

  const header = parseHeaderRegion(text.slice(0, bodyStart));
  const body = parseOfxBody(text.slice(bodyStart));
  Object.assign(header, body.instructions);

  const ofx = findChild(body.root, 'OFX');
  if (ofx === undefined) {
    throw new OfxParseError('Missing <OFX> root element', 'OFX');
  }

  const bankStatement = findFirst(ofx, 'STMTRS');
  const cardStatement = bankStatement === undefined ? findFirst(ofx, 'CCSTMTRS') : undefined;
  const statement = bankStatement ?? cardStatement;
  if (statement === undefined) {
    throw new OfxParseError('No <STMTRS> or <CCSTMTRS> statement found', 'STMTRS');
  }
  const kind: StatementKind = bankStatement !== undefined ? 'bank' : 'credit_card';

  return {
    header,
    institution: parseInstitution(ofx),
    account: parseAccount(statement, kind),
    statement: parseStatement(statement),
  };
}

export function createOfxParser(): OfxParser {
  return { parse: parseOfx };
}
