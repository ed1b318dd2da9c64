import { z } from 'zod';
import { API_PATH } from './config.js';
import { decodeBody } from './content-decoding.js';
import { FetchError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import type { HttpResponse } from './http.js';
import type { ExchangeSession } from './session.js';
import type { DateWindow, RawRow, RawValue } from './types.js';

/**
 * NSE corporate insider trading (PIT) API client.
 *
 * One GET per call against /api/corporates-pit with a dd-mm-yyyy date
 * range. No retries here: the orchestrator decides what a failure means.
 * When the exchange's bot detection kicks in it answers 200 with an
 * HTML challenge page, so the content type is checked before parsing.
 */

const rawValue: z.ZodType<RawValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.undefined(), z.array(rawValue), z.record(rawValue)])
);

const PitEnvelopeSchema = z.object({
  data: z.array(z.record(rawValue)),
});

const RESPONSE_PREVIEW_CHARS = 200;

export interface InsiderFetchResult {
  rows: RawRow[];
  window: DateWindow;
  url: string;
}

export function buildPitUrl(baseUrl: string, window: DateWindow): string {
  const params = new URLSearchParams({
    index: 'equities',
    from_date: window.from_param,
    to_date: window.to_param,
  });
  return `${baseUrl}${API_PATH}?${params.toString()}`;
}

/**
 * Fetch raw insider trading rows for a window.
 * An empty `rows` list is a normal "nothing new" answer.
 */
export async function fetchInsiderData(
  session: ExchangeSession,
  window: DateWindow,
  logger: Logger
): Promise<InsiderFetchResult> {
  const url = buildPitUrl(session.baseUrl, window);
  logger.info({ from: window.from_param, to: window.to_param }, 'Fetching insider trading data');

  let response: HttpResponse;
  try {
    response = await session.get(url);
  } catch (err) {
    throw new FetchError(`Network error fetching ${url}: ${describeError(err)}`, 0, url);
  }
  logger.info({ status: response.status }, 'API response received');

  if (response.status < 200 || response.status >= 300) {
    throw new FetchError(`NSE API error: HTTP ${response.status}`, response.status, url);
  }

  const contentEncoding = response.headers.get('content-encoding');
  if (contentEncoding) {
    logger.debug({ contentEncoding }, 'Response is content-encoded');
  }
  const text = decodeBody(response.body, contentEncoding, response.decodedEncodings, {
    url,
    status: response.status,
  });

  logger.debug({ preview: text.slice(0, RESPONSE_PREVIEW_CHARS) }, 'Response preview');

  const contentType = response.headers.get('content-type') ?? '';
  if (!contentType.toLowerCase().includes('application/json')) {
    throw new FetchError(
      `Expected JSON but got "${contentType || 'no content type'}"; the exchange may be serving a CAPTCHA page`,
      response.status,
      url,
      text
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new FetchError(`Malformed JSON from NSE API: ${describeError(err)}`, response.status, url);
  }

  const parsed = PitEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new FetchError('Invalid data structure received: expected an object with a "data" list', response.status, url);
  }

  const rows = parsed.data.data;
  if (rows.length === 0) {
    logger.info('No new insider trading data found');
  } else {
    logger.info({ records: rows.length }, 'Fetched insider trading records');
  }

  return { rows, window, url };
}
