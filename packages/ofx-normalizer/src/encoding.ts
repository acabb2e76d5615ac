export type DecodedEncoding = 'utf-8' | 'latin1';

export interface DecodeResult {
  text: string;
  encoding: DecodedEncoding;
  /** True when the bytes were not valid UTF-8 and the single-byte fallback was used */
  fallback: boolean;
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode an uploaded OFX file of unknown encoding.
 *
 * Strict UTF-8 is tried first (a leading BOM is dropped). Bytes that are not valid
 * UTF-8 are decoded as Latin-1, which maps every byte to a character, so this never
 * throws on legacy exports.
 */
export function decodeOfxBytes(bytes: Uint8Array): DecodeResult {
  try {
    return { text: utf8Decoder.decode(bytes), encoding: 'utf-8', fallback: false };
  } catch (error) {
    if (!(error instanceof TypeError)) {
      throw error;
    }
    const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
    return { text, encoding: 'latin1', fallback: true };
  }
}
