/**
 * Minimal HTTP transport used by the exchange session.
 *
 * The transport does not follow the exchange's cookie protocol or
 * decode payloads it does not understand; the session and the fetch
 * client handle those on top of the raw response.
 */

export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  headers: Headers;
  body: Buffer;
  /**
   * Content-Encoding tokens the transport already removed from `body`.
   * The header itself is left as the server sent it.
   */
  decodedEncodings: ReadonlySet<string>;
}

export interface HttpTransport {
  get(request: HttpRequest): Promise<HttpResponse>;
}

/** Encodings Node's fetch decompresses on its own */
const FETCH_DECODED_ENCODINGS: ReadonlySet<string> = new Set(['gzip', 'x-gzip', 'deflate', 'br']);

export const fetchTransport: HttpTransport = {
  async get({ url, headers, timeoutMs }) {
    const response = await fetch(url, {
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = Buffer.from(await response.arrayBuffer());
    return {
      status: response.status,
      headers: response.headers,
      body,
      decodedEncodings: FETCH_DECODED_ENCODINGS,
    };
  },
};

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Uniform random delay in [minMs, maxMs] */
export function jitterMs(minMs: number, maxMs: number, random: () => number = Math.random): number {
  return minMs + random() * (maxMs - minMs);
}
