import { describe, it, expect } from 'vitest';
import { brotliCompressSync, gzipSync } from 'node:zlib';
import { decodeBody, parseContentEncoding } from '../src/core/content-decoding.js';
import { FetchError } from '../src/core/errors.js';

const SOURCE = { url: 'https://nse.test/api/corporates-pit', status: 200 };
const NONE: ReadonlySet<string> = new Set();

describe('parseContentEncoding', () => {
  it('lowercases tokens and drops identity', () => {
    expect(parseContentEncoding('GZIP, identity, br')).toEqual(['gzip', 'br']);
    expect(parseContentEncoding(null)).toEqual([]);
    expect(parseContentEncoding('')).toEqual([]);
  });
});

describe('decodeBody', () => {
  it('returns plain bodies as text', () => {
    expect(decodeBody(Buffer.from('{"data":[]}'), null, NONE, SOURCE)).toBe('{"data":[]}');
  });

  it('decompresses brotli the transport left encoded', () => {
    const body = brotliCompressSync(Buffer.from('{"data":[1]}'));
    expect(decodeBody(body, 'br', NONE, SOURCE)).toBe('{"data":[1]}');
  });

  it('leaves bodies the transport already decoded', () => {
    expect(decodeBody(Buffer.from('plain'), 'br', new Set(['br']), SOURCE)).toBe('plain');
  });

  it('undoes stacked encodings in reverse order', () => {
    const body = brotliCompressSync(gzipSync(Buffer.from('stacked')));
    expect(decodeBody(body, 'gzip, br', NONE, SOURCE)).toBe('stacked');
  });

  it('fails on an unsupported scheme instead of returning compressed bytes', () => {
    expect(() => decodeBody(Buffer.from('xx'), 'zstd', NONE, SOURCE)).toThrow(FetchError);
    expect(() => decodeBody(Buffer.from('xx'), 'zstd', NONE, SOURCE)).toThrow('Unsupported response encoding "zstd"');
  });

  it('fails on a corrupt payload', () => {
    expect(() => decodeBody(Buffer.from('not gzip'), 'gzip', NONE, SOURCE)).toThrow('Failed to decompress gzip response');
  });
});
