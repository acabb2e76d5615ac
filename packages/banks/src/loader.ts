import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { BankTableSchema, type BankEntry } from '@extrato/types';
import { createBankDirectory, type BankDirectory } from './directory.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function getBundledBankTablePath(): string {
  return resolve(__dirname, '../data/banks.json');
}

/**
 * Read and validate a bank table file: a JSON array of `{ code, name }` entries.
 */
export function readBankTable(filePath: string): BankEntry[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read bank table ${filePath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Bank table ${filePath} is not valid JSON: ${reason}`);
  }

  const parsed = BankTableSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `  ${issue.path.join('.') || '/'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid bank table ${filePath}:\n${issues}`);
  }
  return parsed.data;
}

/**
 * Load a bank directory from a table file, or from the bundled COMPE table when no
 * path is given.
 */
export function loadBankDirectory(filePath?: string): BankDirectory {
  return createBankDirectory(readBankTable(filePath ?? getBundledBankTablePath()));
}
