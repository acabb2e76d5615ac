import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  createBankDirectory,
  getBundledBankTablePath,
  loadBankDirectory,
  normalizeBankCode,
  readBankTable,
} from '@extrato/banks';

describe('normalizeBankCode', () => {
  it('should strip leading zeros', () => {
    expect(normalizeBankCode('001')).toBe('1');
    expect(normalizeBankCode(' 0341 ')).toBe('341');
    expect(normalizeBankCode('237')).toBe('237');
  });

  it('should keep a single zero for an all-zero code', () => {
    expect(normalizeBankCode('000')).toBe('0');
  });

  it('should return an empty string for a blank code', () => {
    expect(normalizeBankCode('  ')).toBe('');
  });
});

describe('createBankDirectory', () => {
  const directory = createBankDirectory([
    { code: '001', name: 'Banco Um' },
    { code: '0001', name: 'Banco Repetido' },
    { code: '260', name: 'Banco Digital' },
  ]);

  it('should look codes up regardless of zero padding', () => {
    expect(directory.lookup('1')).toBe('Banco Um');
    expect(directory.lookup('001')).toBe('Banco Um');
    expect(directory.lookup('00260')).toBe('Banco Digital');
  });

  it('should keep the first entry of a repeated code', () => {
    expect(directory.size).toBe(2);
  });

  it('should return undefined for unknown or blank codes', () => {
    expect(directory.lookup('999')).toBeUndefined();
    expect(directory.lookup('')).toBeUndefined();
  });
});

describe('bundled bank table', () => {
  it('should load and resolve the large retail banks', () => {
    const directory = loadBankDirectory();

    expect(directory.size).toBe(34);
    expect(directory.lookup('001')).toBe('Banco do Brasil S.A.');
    expect(directory.lookup('341')).toBe('Itaú Unibanco S.A.');
    expect(directory.lookup('0104')).toBe('Caixa Econômica Federal');
    expect(directory.lookup('260')).toBe('Nu Pagamentos S.A.');
  });

  it('should point at the JSON file shipped with the package', () => {
    expect(getBundledBankTablePath().endsWith(join('banks', 'data', 'banks.json'))).toBe(true);
  });
});

describe('readBankTable', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `extrato-banks-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read a custom table', async () => {
    const filePath = join(testDir, 'banks.json');
    await writeFile(filePath, JSON.stringify([{ code: '999', name: 'Cooperativa Local' }]));

    expect(readBankTable(filePath)).toEqual([{ code: '999', name: 'Cooperativa Local' }]);
    expect(loadBankDirectory(filePath).lookup('999')).toBe('Cooperativa Local');
  });

  it('should reject invalid JSON', async () => {
    const filePath = join(testDir, 'broken.json');
    await writeFile(filePath, '[{ "code": ');

    expect(() => readBankTable(filePath)).toThrow(`Bank table ${filePath} is not valid JSON`);
  });

  it('should reject entries that fail validation', async () => {
    const filePath = join(testDir, 'invalid.json');
    await writeFile(filePath, JSON.stringify([{ code: '12a', name: 'Banco X' }]));

    expect(() => readBankTable(filePath)).toThrow('0.code: Bank code must contain only digits');
  });

  it('should report a missing file', () => {
    const filePath = join(testDir, 'missing.json');
    expect(() => readBankTable(filePath)).toThrow(`Cannot read bank table ${filePath}`);
  });
});
