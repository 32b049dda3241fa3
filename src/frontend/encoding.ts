/**
 * Unicode encodings a YAML stream may use.
 */
export type Encoding = 'utf-8' | 'utf-16be' | 'utf-16le' | 'utf-32be' | 'utf-32le';

export type DecodeResult =
  | { kind: 'ok'; encoding: Encoding; text: string }
  | { kind: 'error'; encoding: Encoding; message: string };

/**
 * Detect the encoding of `bytes` and decode them.
 *
 * Detection looks at the first four bytes at most: an explicit byte order mark, or else the zero
 * bytes that an ASCII first character leaves in a UTF-16/UTF-32 stream. Four-byte patterns are
 * tested before two-byte ones. A byte order mark is decoded like any other character and stays in
 * the text.
 */
export function decode(bytes: Uint8Array): DecodeResult {
  const encoding = detectEncoding(bytes);
  const text = decodeAs(bytes, encoding);
  if (text === undefined) {
    const family = encoding.slice(0, encoding.startsWith('utf-8') ? 5 : 6);
    return { kind: 'error', encoding, message: `source file was not valid ${family}` };
  }
  return { kind: 'ok', encoding, text };
}

export function detectEncoding(bytes: Uint8Array): Encoding {
  const [b0, b1, b2, b3] = bytes;
  if (bytes.length >= 4) {
    if (b0 === 0x00 && b1 === 0x00 && b2 === 0xfe && b3 === 0xff) return 'utf-32be';
    if (b0 === 0x00 && b1 === 0x00 && b2 === 0x00) return 'utf-32be';
    if (b0 === 0xff && b1 === 0xfe && b2 === 0x00 && b3 === 0x00) return 'utf-32le';
    if (b1 === 0x00 && b2 === 0x00 && b3 === 0x00) return 'utf-32le';
  }
  if (bytes.length >= 2) {
    if (b0 === 0xfe && b1 === 0xff) return 'utf-16be';
    if (b0 === 0x00) return 'utf-16be';
    if (b0 === 0xff && b1 === 0xfe) return 'utf-16le';
    if (b1 === 0x00) return 'utf-16le';
  }
  return 'utf-8';
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function decodeAs(bytes: Uint8Array, encoding: Encoding): string | undefined {
  switch (encoding) {
    case 'utf-8':
      try {
        return utf8Decoder.decode(bytes);
      } catch (err) {
        if (err instanceof TypeError) return undefined;
        throw err;
      }
    case 'utf-16be':
      return decodeUtf16(bytes, false);
    case 'utf-16le':
      return decodeUtf16(bytes, true);
    case 'utf-32be':
      return decodeUtf32(bytes, false);
    case 'utf-32le':
      return decodeUtf32(bytes, true);
  }
}

function decodeUtf16(bytes: Uint8Array, littleEndian: boolean): string | undefined {
  if (bytes.length % 2 !== 0) return undefined;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let out = '';
  let pendingHigh = false;
  for (let i = 0; i < bytes.length; i += 2) {
    const unit = view.getUint16(i, littleEndian);
    // A low surrogate must follow a high one, and only a low surrogate may.
    if (isLowSurrogate(unit) !== pendingHigh) return undefined;
    pendingHigh = isHighSurrogate(unit);
    out += String.fromCharCode(unit);
  }
  return pendingHigh ? undefined : out;
}

function decodeUtf32(bytes: Uint8Array, littleEndian: boolean): string | undefined {
  if (bytes.length % 4 !== 0) return undefined;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let out = '';
  for (let i = 0; i < bytes.length; i += 4) {
    const codePoint = view.getUint32(i, littleEndian);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) return undefined;
    out += String.fromCodePoint(codePoint);
  }
  return out;
}

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}
