// Zod schemas, inferred types and JSON Schema validation of the output document
export * from './schemas/index.js';

// Pure utils (date, money, constants, logger)
export * from './utils/index.js';
