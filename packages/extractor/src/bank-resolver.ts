import { UNKNOWN_BANK_NAME, silentLogger, type Logger, type ResolvedBank } from '@extrato/types';
import type { BankDirectory } from '@extrato/banks';
import type { OfxAccount } from '@extrato/ofx-parser';

export interface BankResolutionOptions {
  banks: BankDirectory;
  unknownBankName?: string;
  logger?: Logger;
}

/**
 * Find the bank code of a statement: the parser's BANKID first, then the first
 * numeric `<BANKID>` in the normalized text.
 */
export function findBankCode(account: Pick<OfxAccount, 'bankId'> | null, normalizedText: string): string | null {
  const fromParser = account?.bankId.trim() ?? '';
  if (fromParser !== '') {
    return fromParser;
  }
  const match = normalizedText.match(/<BANKID>\s*(\d+)/);
  return match?.[1] ?? null;
}

export function findOrgName(normalizedText: string): string | null {
  const match = normalizedText.match(/<ORG>([^<\n]+)/);
  const org = match?.[1]?.trim() ?? '';
  return org !== '' ? org : null;
}

/**
 * Resolve the display name of the issuing bank. Falls back to the `<ORG>` text and
 * finally to the unknown-bank sentinel; never throws.
 */
export function resolveBank(
  account: Pick<OfxAccount, 'bankId'> | null,
  normalizedText: string,
  options: BankResolutionOptions
): ResolvedBank {
  const logger = options.logger ?? silentLogger;
  const unknownBankName = options.unknownBankName ?? UNKNOWN_BANK_NAME;

  const code = findBankCode(account, normalizedText);
  if (code !== null) {
    const name = options.banks.lookup(code);
    if (name !== undefined) {
      return { code, name, source: 'lookup' };
    }
    logger.warn(`Bank code ${code} not found in bank table`);
  }

  const org = findOrgName(normalizedText);
  if (org !== null) {
    logger.warn(`Using <ORG> "${org}" as bank name`);
    return { code, name: org, source: 'org' };
  }

  logger.warn('Bank could not be identified');
  return { code, name: unknownBankName, source: 'unknown' };
}
