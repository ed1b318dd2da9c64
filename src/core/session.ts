import { CookieError, describeError } from './errors.js';
import { LISTING_PATH } from './config.js';
import { fetchTransport, jitterMs, sleep, type HttpResponse, type HttpTransport } from './http.js';
import type { Logger } from './logger.js';

/**
 * Browser-like HTTP session against nseindia.com.
 *
 * The site only serves its JSON API to clients that first loaded the
 * HTML pages and carry the resulting cookies, with headers matching
 * what a browser's XHR would send. One session lives for the whole
 * process and is handed to each fetch explicitly.
 */

export const USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

export interface SessionOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  transport?: HttpTransport;
  /** Injected for tests; defaults to Math.random */
  random?: () => number;
  /** Pacing delay between bootstrap requests */
  delay?: (ms: number) => Promise<void>;
}

export class ExchangeSession {
  readonly baseUrl: string;
  readonly userAgent: string;
  private readonly cookies = new Map<string, string>();
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly delay: (ms: number) => Promise<void>;

  constructor(options: SessionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.transport = options.transport ?? fetchTransport;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.random = options.random ?? Math.random;
    this.delay = options.delay ?? sleep;

    const index = Math.min(USER_AGENTS.length - 1, Math.floor(this.random() * USER_AGENTS.length));
    this.userAgent = USER_AGENTS[index];
  }

  get listingUrl(): string {
    return `${this.baseUrl}${LISTING_PATH}`;
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'Accept': 'application/json, text/plain, */*',
      'Accept-Language': 'en-US,en;q=0.9',
      'Accept-Encoding': 'gzip, deflate',
      'Cache-Control': 'no-cache',
      'Pragma': 'no-cache',
      'Sec-Ch-Ua': '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
      'Sec-Ch-Ua-Mobile': '?0',
      'Sec-Ch-Ua-Platform': '"Windows"',
      'Sec-Fetch-Dest': 'empty',
      'Sec-Fetch-Mode': 'cors',
      'Sec-Fetch-Site': 'same-origin',
      'X-Requested-With': 'XMLHttpRequest',
      'Referer': this.listingUrl,
    };
    const cookie = this.cookieHeader();
    if (cookie) headers['Cookie'] = cookie;
    return headers;
  }

  cookieHeader(): string {
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
  }

  get cookieCount(): number {
    return this.cookies.size;
  }

  /** GET with session headers; cookies from the response are stored */
  async get(url: string): Promise<HttpResponse> {
    const response = await this.transport.get({ url, headers: this.headers(), timeoutMs: this.timeoutMs });
    this.storeCookies(response.headers);
    return response;
  }

  /**
   * Visit the homepage and the insider trading listing to pick up cookies.
   * Throws CookieError if either request fails or the listing is not 200.
   */
  async bootstrap(): Promise<void> {
    this.logger.info('Getting session cookies');

    const home = await this.getForCookies(this.baseUrl);
    this.logger.info({ status: home.status }, 'Homepage fetched');
    await this.delay(jitterMs(1000, 3000, this.random));

    const listing = await this.getForCookies(this.listingUrl);
    this.logger.info({ status: listing.status, cookies: this.cookieCount }, 'Insider trading page fetched');
    await this.delay(jitterMs(1000, 2000, this.random));

    if (listing.status !== 200) {
      throw new CookieError(`Insider trading page returned ${listing.status}`, this.listingUrl, listing.status);
    }
  }

  private async getForCookies(url: string): Promise<HttpResponse> {
    try {
      return await this.get(url);
    } catch (err) {
      throw new CookieError(`Network error fetching ${url}: ${describeError(err)}`, url);
    }
  }

  private storeCookies(headers: Headers): void {
    for (const line of headers.getSetCookie()) {
      const pair = line.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (value === '') {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }
}
