import { describe, expect, it } from 'vitest';

import { decode, detectEncoding } from '../src/frontend/encoding.js';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

describe('encoding detection', () => {
  it('defaults to utf-8, including a utf-8 byte order mark', () => {
    expect(detectEncoding(bytes())).toBe('utf-8');
    expect(detectEncoding(bytes(0x61))).toBe('utf-8');
    expect(detectEncoding(bytes(0xef, 0xbb, 0xbf, 0x61))).toBe('utf-8');
  });

  it('recognises utf-16 by byte order mark or by the zero byte of an ASCII first character', () => {
    expect(detectEncoding(bytes(0xfe, 0xff, 0x00, 0x61))).toBe('utf-16be');
    expect(detectEncoding(bytes(0xff, 0xfe, 0x61, 0x00))).toBe('utf-16le');
    expect(detectEncoding(bytes(0x00, 0x61))).toBe('utf-16be');
    expect(detectEncoding(bytes(0x61, 0x00, 0x62, 0x00))).toBe('utf-16le');
  });

  it('tests four-byte patterns before two-byte ones', () => {
    expect(detectEncoding(bytes(0x00, 0x00, 0xfe, 0xff))).toBe('utf-32be');
    expect(detectEncoding(bytes(0x00, 0x00, 0x00, 0x61))).toBe('utf-32be');
    expect(detectEncoding(bytes(0xff, 0xfe, 0x00, 0x00))).toBe('utf-32le');
    expect(detectEncoding(bytes(0x61, 0x00, 0x00, 0x00))).toBe('utf-32le');
  });
});

describe('decoding', () => {
  it('keeps the byte order mark as U+FEFF', () => {
    expect(decode(bytes(0xfe, 0xff, 0x00, 0x61))).toEqual({
      kind: 'ok',
      encoding: 'utf-16be',
      text: '\uFEFFa',
    });
    expect(decode(bytes(0xef, 0xbb, 0xbf, 0x61))).toEqual({
      kind: 'ok',
      encoding: 'utf-8',
      text: '\uFEFFa',
    });
    expect(decode(bytes(0xff, 0xfe, 0x00, 0x00, 0x61, 0x00, 0x00, 0x00))).toEqual({
      kind: 'ok',
      encoding: 'utf-32le',
      text: '\uFEFFa',
    });
  });

  it('decodes utf-16 surrogate pairs and utf-32 astral code points', () => {
    expect(decode(bytes(0xff, 0xfe, 0x3d, 0xd8, 0x00, 0xde))).toEqual({
      kind: 'ok',
      encoding: 'utf-16le',
      text: '\uFEFF\u{1F600}',
    });
    expect(decode(bytes(0x00, 0x00, 0x00, 0x61, 0x00, 0x01, 0xf6, 0x00))).toEqual({
      kind: 'ok',
      encoding: 'utf-32be',
      text: 'a\u{1F600}',
    });
  });

  it('rejects an odd byte count for utf-16', () => {
    expect(decode(bytes(0x61, 0x00, 0x62))).toEqual({
      kind: 'error',
      encoding: 'utf-16le',
      message: 'source file was not valid utf-16',
    });
  });

  it('rejects unpaired surrogates in utf-16', () => {
    const result = decode(bytes(0xfe, 0xff, 0xd8, 0x00, 0x00, 0x61));
    expect(result).toEqual({
      kind: 'error',
      encoding: 'utf-16be',
      message: 'source file was not valid utf-16',
    });
  });

  it('rejects malformed utf-8', () => {
    expect(decode(bytes(0x61, 0xff))).toEqual({
      kind: 'error',
      encoding: 'utf-8',
      message: 'source file was not valid utf-8',
    });
  });

  it('rejects utf-32 values beyond the Unicode range', () => {
    expect(decode(bytes(0x00, 0x00, 0xfe, 0xff, 0x00, 0x11, 0x00, 0x00))).toEqual({
      kind: 'error',
      encoding: 'utf-32be',
      message: 'source file was not valid utf-32',
    });
  });
});
