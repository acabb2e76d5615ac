import type { BankEntry } from '@extrato/types';

/**
 * Read-only bank table keyed by COMPE code. Codes are compared without leading
 * zeros, so "001", "01" and "1" name the same bank.
 */
export interface BankDirectory {
  lookup(code: string): string | undefined;
  readonly size: number;
}

export function normalizeBankCode(code: string): string {
  const trimmed = code.trim();
  if (trimmed === '') {
    return '';
  }
  const stripped = trimmed.replace(/^0+/, '');
  return stripped === '' ? '0' : stripped;
}

export function createBankDirectory(entries: readonly BankEntry[]): BankDirectory {
  const byCode = new Map<string, string>();
  for (const entry of entries) {
    const key = normalizeBankCode(entry.code);
    // first entry wins when a table repeats a code
    if (key !== '' && !byCode.has(key)) {
      byCode.set(key, entry.name);
    }
  }

  return {
    lookup(code: string): string | undefined {
      const key = normalizeBankCode(code);
      return key === '' ? undefined : byCode.get(key);
    },
    get size(): number {
      return byCode.size;
    },
  };
}
