export { createBankDirectory, normalizeBankCode, type BankDirectory } from './directory.js';
export { loadBankDirectory, readBankTable, getBundledBankTablePath } from './loader.js';
