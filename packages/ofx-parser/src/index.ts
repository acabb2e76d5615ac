export { parseOfx, createOfxParser } from './parser.js';
export { OfxParseError } from './errors.js';
export { parseOfxDate, parseOfxAmount, decodeEntities } from './values.js';
export { parseOfxBody, findChild, findFirst, childValue, type OfxElement, type OfxBody } from './sgml.js';
export type {
  OfxDocument,
  OfxTransaction,
  OfxAccount,
  OfxInstitution,
  OfxStatement,
  OfxParser,
  StatementKind,
} from './types.js';
