export interface TransactionFilterResult {
  text: string;
  removed: number;
}

const TRANSACTION_BLOCK = /<STMTTRN>[\s\S]*?<\/STMTTRN>/g;

const REQUIRED_FIELDS = ['TRNAMT', 'FITID'] as const;

function isFieldBlank(block: string, tag: string): boolean {
  if (!block.includes(`<${tag}>`)) {
    return true;
  }
  // followed by another tag, or nothing else on its line
  return new RegExp(`<${tag}>\\s*<`).test(block) || new RegExp(`<${tag}>[ \\t]*$`, 'm').test(block);
}

/**
 * A block survives only when both TRNAMT and FITID carry a value.
 */
export function isTransactionBlockUsable(block: string): boolean {
  return REQUIRED_FIELDS.every((tag) => !isFieldBlank(block, tag));
}

/**
 * Drop `<STMTTRN>` blocks without an amount or an id, such as the "Saldo anterior"
 * placeholder rows some banks emit. Surviving blocks are kept byte for byte.
 */
export function filterTransactions(text: string): TransactionFilterResult {
  let removed = 0;
  const filtered = text.replace(TRANSACTION_BLOCK, (block: string) => {
    if (isTransactionBlockUsable(block)) {
      return block;
    }
    removed++;
    return '';
  });
  return { text: filtered, removed };
}
