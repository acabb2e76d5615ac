import Ajv from 'ajv';
import ajvFormats from 'ajv-formats';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { ExtractionOutput } from './extraction.js';

interface AjvErrorObject {
  instancePath: string;
  message?: string;
  keyword: string;
}

interface AjvValidateFunction {
  (data: unknown): boolean;
  errors?: AjvErrorObject[] | null;
}

interface AjvInstance {
  compile: (schema: object) => AjvValidateFunction;
}

type AddFormats = (ajv: AjvInstance) => unknown;

// ajv and ajv-formats are CommonJS; under ESM the callable may sit on `.default`
const formatsModule = ajvFormats as unknown as AddFormats & { default?: AddFormats };
const addFormats: AddFormats = formatsModule.default ?? formatsModule;
const AjvConstructor = Ajv as unknown as new (opts: object) => AjvInstance;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let cachedSchema: object | null = null;
let cachedValidator: AjvValidateFunction | null = null;

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

export function getOutputSchemaPath(): string {
  return resolve(__dirname, '../../schemas/extraction-output.v1.schema.json');
}

export function getOutputSchema(): object {
  if (cachedSchema !== null) {
    return cachedSchema;
  }
  const schemaContent = readFileSync(getOutputSchemaPath(), 'utf-8');
  const schema = JSON.parse(schemaContent) as object;
  cachedSchema = schema;
  return schema;
}

function getValidator(): AjvValidateFunction {
  if (cachedValidator !== null) {
    return cachedValidator;
  }
  const ajv = new AjvConstructor({
    allErrors: true,
    strict: false,
    validateFormats: true,
  });
  addFormats(ajv);
  cachedValidator = ajv.compile(getOutputSchema());
  return cachedValidator;
}

/**
 * Validate an extraction output document against the bundled JSON Schema
 */
export function validateExtractionOutput(payload: unknown): ValidationResult {
  const validate = getValidator();
  if (validate(payload)) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
  }));

  return { valid: false, errors };
}

export function validateExtractionOutputOrThrow(payload: unknown): asserts payload is ExtractionOutput {
  const result = validateExtractionOutput(payload);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message} (${e.keyword})`)
      .join('\n');
    throw new Error(`Output schema validation failed:\n${errorMessages}`);
  }
}
