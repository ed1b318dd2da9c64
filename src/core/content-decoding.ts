import { brotliDecompressSync, gunzipSync, inflateSync } from 'node:zlib';
import { FetchError } from './errors.js';

/**
 * Response body decoding.
 *
 * The exchange sometimes answers with brotli even when the request
 * did not advertise it. Any Content-Encoding the transport left in
 * place is removed here, in reverse order of application.
 */

const DECODERS: Record<string, (body: Buffer) => Buffer> = {
  br: brotliDecompressSync,
  gzip: gunzipSync,
  'x-gzip': gunzipSync,
  deflate: inflateSync,
};

export function parseContentEncoding(header: string | null): string[] {
  if (!header) return [];
  return header
    .split(',')
    .map(token => token.trim().toLowerCase())
    .filter(token => token !== '' && token !== 'identity');
}

/**
 * Undo every encoding in `contentEncoding` that is not in `alreadyDecoded`.
 * Throws FetchError for an unknown scheme or a corrupt payload.
 */
export function decodeBody(
  body: Buffer,
  contentEncoding: string | null,
  alreadyDecoded: ReadonlySet<string>,
  source: { url: string; status: number }
): string {
  const pending = parseContentEncoding(contentEncoding).filter(e => !alreadyDecoded.has(e));

  let decoded = body;
  for (const encoding of pending.reverse()) {
    const decoder = DECODERS[encoding];
    if (!decoder) {
      throw new FetchError(`Unsupported response encoding "${encoding}"; cannot decompress body`, source.status, source.url);
    }
    try {
      decoded = decoder(decoded);
    } catch (err) {
      throw new FetchError(
        `Failed to decompress ${encoding} response: ${err instanceof Error ? err.message : String(err)}`,
        source.status,
        source.url
      );
    }
  }

  return decoded.toString('utf-8');
}
