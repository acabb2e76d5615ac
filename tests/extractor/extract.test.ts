import { describe, it, expect } from 'vitest';
import { CANONICAL_OFX_HEADER } from '@extrato/ofx-normalizer';
import { loadBankDirectory } from '@extrato/banks';
import { createOfxParser } from '@extrato/ofx-parser';
import { ensureUtf8Header, extractOfx, type ExtractionResult } from '@extrato/extractor';
import {
  SAMPLE_TRANSACTIONS,
  buildStatement,
  createRecordingLogger,
  type FixtureTransaction,
} from '../helpers/ofx-fixtures.js';

const banks = loadBankDirectory();
const encoder = new TextEncoder();
const decoder = new TextDecoder();

const [PAYMENT, SALARY] = SAMPLE_TRANSACTIONS;

function expectSuccess(result: ExtractionResult) {
  if (!result.ok) {
    throw new Error(`expected a successful extraction, got: ${result.error}`);
  }
  return result;
}

function realTransactions(): FixtureTransaction[] {
  return SAMPLE_TRANSACTIONS.filter((transaction) => transaction.fitId !== undefined);
}

describe('extractOfx', () => {
  it('should turn a bank export into display rows', () => {
    const raw = encoder.encode(buildStatement({ transactions: SAMPLE_TRANSACTIONS }));
    const result = expectSuccess(extractOfx(raw, { banks }));

    expect(result.rows).toEqual([
      {
        date: '05/01/2024',
        description: 'PAGAMENTO BOLETO',
        documentNumber: '000123',
        amount: '1.234,56',
        debitCredit: 'D',
        counterparty: '',
        bankName: 'Itaú Unibanco S.A.',
      },
      {
        date: '08/01/2024',
        description: 'EMPRESA EXEMPLO LTDA',
        documentNumber: '',
        amount: '9.500,00',
        debitCredit: 'C',
        counterparty: 'EMPRESA EXEMPLO LTDA',
        bankName: 'Itaú Unibanco S.A.',
      },
    ]);
    expect(result.bank).toEqual({ code: '0341', name: 'Itaú Unibanco S.A.', source: 'lookup' });
    expect(result.encoding).toBe('utf-8');
    expect(result.warnings).toEqual(['Removed 1 transaction(s) without TRNAMT or FITID']);
  });

  it('should expose the parsed statement', () => {
    const raw = encoder.encode(buildStatement({ transactions: realTransactions() }));
    const { statement } = expectSuccess(extractOfx(raw, { banks }));

    expect(statement.account.accountId).toBe('12345-6');
    expect(statement.statement.startDate).toBe('2024-01-01');
    expect(statement.statement.endDate).toBe('2024-01-10');
    expect(statement.statement.transactions.map((transaction) => transaction.amount)).toEqual([-1234.56, 9500]);
  });

  it('should read Latin-1 exports', () => {
    const text = buildStatement({
      transactions: [{ type: 'CREDIT', date: '05/01/2024 00:00:00', amount: '3.000.00', fitId: 'S1', memo: 'PAGAMENTO SALÁRIO' }],
    });
    const result = expectSuccess(extractOfx(Buffer.from(text, 'latin1'), { banks }));

    expect(result.encoding).toBe('latin1');
    expect(result.rows[0]?.description).toBe('PAGAMENTO SALÁRIO');
    expect(result.rows[0]?.amount).toBe('3.000,00');
    expect(result.warnings).toEqual(['File is not valid UTF-8; decoded as Latin-1']);
  });

  it('should parse a document without a header', () => {
    const raw = encoder.encode(buildStatement({ header: '', transactions: realTransactions() }));
    const result = expectSuccess(extractOfx(raw, { banks }));

    expect(result.rows).toHaveLength(2);
    expect(result.warnings).toEqual(['No OFX header found; inserted the canonical header']);
  });

  it('should keep a single header when the export declares its encoding in lower case', () => {
    const raw = encoder.encode(buildStatement({ header: 'encoding: iso-8859-1\n\n', transactions: realTransactions() }));
    const dumps: string[] = [];
    const result = expectSuccess(extractOfx(raw, { banks, dumpNormalized: (text) => dumps.push(text) }));

    expect(result.warnings).toEqual([]);
    expect(result.rows).toHaveLength(2);
    expect(dumps[0]?.startsWith('ENCODING:UTF-8\n\n<OFX>\n')).toBe(true);
  });

  it('should keep every row when a transaction has an empty optional field', () => {
    const raw = encoder.encode(
      buildStatement({
        transactions: [{ type: 'DEBIT', date: '05/01/2024 10:30:00', amount: '-20.00', fitId: 'P1', checkNum: '', memo: 'PIX' }],
      })
    );
    const result = expectSuccess(extractOfx(raw, { banks }));

    expect(result.rows).toEqual([
      {
        date: '05/01/2024',
        description: 'PIX',
        documentNumber: '',
        amount: '20,00',
        debitCredit: 'D',
        counterparty: '',
        bankName: 'Itaú Unibanco S.A.',
      },
    ]);
  });

  it('should fall back to the ORG name when there is no bank code', () => {
    const logger = createRecordingLogger();
    const raw = encoder.encode(
      buildStatement({ bankId: null, org: 'Cooperativa Exemplo', transactions: realTransactions() })
    );
    const result = expectSuccess(extractOfx(raw, { banks, logger }));

    expect(result.bank).toEqual({ code: null, name: 'Cooperativa Exemplo', source: 'org' });
    expect(result.rows.map((row) => row.bankName)).toEqual(['Cooperativa Exemplo', 'Cooperativa Exemplo']);
    expect(result.warnings).toEqual(['Using <ORG> "Cooperativa Exemplo" as bank name']);
    expect(logger.lines).toContain('warn: Using <ORG> "Cooperativa Exemplo" as bank name');
  });

  it('should use the unknown-bank name when nothing identifies the bank', () => {
    const raw = encoder.encode(buildStatement({ bankId: '998', org: null, transactions: realTransactions() }));
    const result = expectSuccess(extractOfx(raw, { banks, unknownBankName: 'Outro Banco' }));

    expect(result.bank).toEqual({ code: '998', name: 'Outro Banco', source: 'unknown' });
    expect(result.warnings).toEqual(['Bank code 998 not found in bank table', 'Bank could not be identified']);
  });

  it('should return no rows when the parser rejects the document', () => {
    const logger = createRecordingLogger();
    const raw = encoder.encode(
      buildStatement({ transactions: [{ ...PAYMENT, type: 'DEBIT', date: '32/01/2024 10:00:00', amount: '-5.00' }] })
    );

    const result = extractOfx(raw, { banks, logger });

    expect(result).toEqual({
      ok: false,
      rows: [],
      error: 'Invalid <DTPOSTED> value: "32/01/2024 10:00:00"',
      encoding: 'utf-8',
      warnings: ['Invalid date <DTPOSTED>32/01/2024 10:00:00 left unchanged'],
    });
    expect(logger.lines).toContain('error: OFX parsing failed: Invalid <DTPOSTED> value: "32/01/2024 10:00:00"');
  });

  it('should use an injected parser', () => {
    const result = extractOfx(encoder.encode('<OFX></OFX>'), {
      banks,
      parser: {
        parse: () => {
          throw new Error('parser exploded');
        },
      },
    });

    expect(result.ok).toBe(false);
    expect(result.rows).toEqual([]);
    if (!result.ok) {
      expect(result.error).toBe('parser exploded');
    }
  });

  it('should return no rows when a transaction cannot be mapped', () => {
    const logger = createRecordingLogger();
    const strict = createOfxParser();
    const raw = encoder.encode(buildStatement({ transactions: realTransactions() }));

    const result = extractOfx(raw, {
      banks,
      logger,
      parser: {
        parse: (data) => {
          const document = strict.parse(data);
          const transactions = document.statement.transactions.map((transaction) => ({
            ...transaction,
            amount: Number.NaN,
          }));
          return { ...document, statement: { ...document.statement, transactions } };
        },
      },
    });

    expect(result.ok).toBe(false);
    expect(result.rows).toEqual([]);
    if (!result.ok) {
      expect(result.error).toBe('Cannot format amount: NaN');
    }
    expect(logger.lines).toContain('error: Row mapping failed: Cannot format amount: NaN');
  });

  it('should hand the normalized text to dumpNormalized', () => {
    const dumps: string[] = [];
    const raw = encoder.encode(buildStatement({ transactions: SALARY !== undefined ? [SALARY] : [] }));

    extractOfx(raw, { banks, dumpNormalized: (text) => dumps.push(text) });

    expect(dumps).toHaveLength(1);
    expect(dumps[0]?.startsWith(CANONICAL_OFX_HEADER + '<OFX>\n')).toBe(true);
    expect(dumps[0]).toContain('<DTPOSTED>20240108000000\n<TRNAMT>9500.00\n<FITID>T2\n');
  });
});

describe('ensureUtf8Header', () => {
  it('should leave bytes that declare UTF-8 untouched', () => {
    const bytes = encoder.encode('ENCODING:UTF-8\n\n<OFX></OFX>');
    const result = ensureUtf8Header(bytes);

    expect(result.prepended).toBe(false);
    expect(result.bytes).toBe(bytes);
  });

  it('should prepend the canonical header when the declaration is missing', () => {
    const result = ensureUtf8Header(encoder.encode('<OFX></OFX>'));

    expect(result.prepended).toBe(true);
    expect(decoder.decode(result.bytes)).toBe(CANONICAL_OFX_HEADER + '<OFX></OFX>');
  });

  it('should only look at the header scan window', () => {
    const bytes = encoder.encode(' '.repeat(600) + 'ENCODING:UTF-8');

    expect(ensureUtf8Header(bytes).prepended).toBe(true);
    expect(ensureUtf8Header(bytes, 1024).prepended).toBe(false);
  });
});
