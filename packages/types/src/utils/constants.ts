export const EXTRACTOR_NAME = 'extrato';

export const EXTRACTOR_VERSION = '0.4.0';

export const OUTPUT_SCHEMA_VERSION = '1.0.0' as const;

/** Sentinel bank name used when neither the bank table nor <ORG> identify the bank */
export const UNKNOWN_BANK_NAME = 'Banco Desconhecido';

/** Number of leading bytes searched for ENCODING:UTF-8 before the parser runs */
export const DEFAULT_HEADER_SCAN_BYTES = 512;
