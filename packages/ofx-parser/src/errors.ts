/**
 * Thrown when an OFX document cannot be turned into a statement: unbalanced tags,
 * no <OFX> root, or a transaction whose required fields do not parse.
 */
export class OfxParseError extends Error {
  constructor(
    message: string,
    public readonly tag?: string
  ) {
    super(message);
    this.name = 'OfxParseError';
    Object.setPrototypeOf(this, OfxParseError.prototype);
  }
}
