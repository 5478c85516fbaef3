/**
 * Wallhaven API Service
 *
 * Client for the Wallhaven API (https://wallhaven.cc/help/api).
 * Wraps wallpaper, tag, settings, collection and search endpoints and returns
 * the `data` payload of each response, validated but otherwise unchanged.
 *
 * IMPORTANT: Wallhaven allows 45 requests per minute.
 * The client spaces consecutive requests by `requestDelayMs` (default 500ms)
 * and surfaces HTTP 429 as a RateLimitError. It never retries.
 *
 * An API key is required for NSFW searches, user settings and the
 * API-key collection listing.
 */

import type { z } from 'zod';
import {
  CollectionLimitSchema,
  CollectionListResponseSchema,
  CollectionPageResponseSchema,
  RawSearchParamsSchema,
  RequestDelaySchema,
  SearchResponseSchema,
  TagResponseSchema,
  UserSettingsResponseSchema,
  WallpaperResponseSchema,
  parseInput,
  type Collection,
  type SearchResult,
  type Tag,
  type UserSettings,
  type Wallpaper,
} from '../schemas/wallhaven.schemas.js';
import { resolveClientConfig, type ClientConfigOverrides } from './config.service.js';
import { clientLogger, type Logger } from './logger.service.js';
import { SearchParameters, type SearchParams } from './search-parameters.service.js';
import {
  AuthenticationRequiredError,
  NotFoundError,
  RateLimitError,
  RequestError,
  describeHttpStatus,
  isWallhavenError,
} from './wallhaven-errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Minimal fetch signature the client depends on
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface WallhavenClientOptions extends ClientConfigOverrides {
  /** Transport, defaults to the global fetch */
  fetch?: FetchLike;
  logger?: Logger;
}

export type SearchInput = SearchParameters | SearchParams | Record<string, string>;

// =============================================================================
// Helpers
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Seconds from a Retry-After header (delta-seconds or HTTP date)
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds);
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Flatten builder output or a raw mapping into validated string pairs
 */
function toQueryParams(input: SearchInput): Record<string, string> {
  const source = input instanceof SearchParameters ? input.getParams() : input;
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      defined[key] = value;
    }
  }
  return parseInput(RawSearchParamsSchema, defined, 'Invalid search parameters');
}

// =============================================================================
// Client
// =============================================================================

/**
 * Pacing waits before a request, never after it: a lone call goes out at once,
 * and back-to-back calls are at least `requestDelayMs` apart.
 */
export class WallhavenClient {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;
  private readonly lifecycle = new AbortController();

  private requestDelayMs: number;
  private lastRequestTime = 0;

  constructor(options: WallhavenClientOptions = {}) {
    const { fetch: fetchImpl, logger, ...overrides } = options;
    const config = resolveClientConfig(overrides);

    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.requestDelayMs = config.requestDelayMs;
    this.timeoutMs = config.timeoutMs;
    this.userAgent = config.userAgent;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = logger ?? clientLogger;
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  getRequestDelay(): number {
    return this.requestDelayMs;
  }

  /**
   * Minimum spacing between consecutive requests, in milliseconds
   * @throws {ValidationError} On a negative or non-finite value
   */
  setRequestDelay(ms: number): void {
    this.requestDelayMs = parseInput(RequestDelaySchema, ms, 'Invalid request delay');
  }

  /**
   * Abort in-flight requests. The client rejects every later call.
   */
  close(): void {
    if (!this.lifecycle.signal.aborted) {
      this.lifecycle.abort();
      this.log.debug('Client closed');
    }
  }

  isClosed(): boolean {
    return this.lifecycle.signal.aborted;
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  /**
   * Wallpaper metadata, including uploader and tags
   * @throws {NotFoundError} When the wallpaper does not exist
   */
  async getWallpaperInfo(id: string): Promise<Wallpaper> {
    const response = await this.request(`/w/${encodeURIComponent(id)}`, WallpaperResponseSchema);
    return response.data;
  }

  /**
   * @throws {NotFoundError} When the tag does not exist
   */
  async getTagInfo(id: number | string): Promise<Tag> {
    const response = await this.request(`/tag/${encodeURIComponent(String(id))}`, TagResponseSchema);
    return response.data;
  }

  /**
   * Account preferences of the API key owner
   * @throws {AuthenticationRequiredError} Without a key, or when the key is rejected
   */
  async getUserSettings(): Promise<UserSettings> {
    this.requireApiKey('User settings require an API key');

    try {
      const response = await this.request('/settings', UserSettingsResponseSchema);
      return response.data;
    } catch (err) {
      // Wallhaven answers 404 here for an unknown key
      if (isWallhavenError(err, 'NOT_FOUND')) {
        throw new AuthenticationRequiredError('API key is not valid', 404);
      }
      throw err;
    }
  }

  /**
   * Public collections of a user
   * @throws {NotFoundError} When the user does not exist
   */
  async getCollectionsFromUsername(username: string): Promise<Collection[]> {
    const response = await this.request(
      `/collections/${encodeURIComponent(username)}`,
      CollectionListResponseSchema
    );
    return response.data;
  }

  /**
   * Public and private collections of the API key owner
   */
  async getCollectionsFromApiKey(): Promise<Collection[]> {
    this.requireApiKey('Listing your own collections requires an API key');
    const response = await this.request('/collections', CollectionListResponseSchema);
    return response.data;
  }

  /**
   * Wallpapers in a collection, following pages until `limit` items are
   * collected or the last page is read. A limit of 0 (default) reads every page.
   */
  async getWallpapersFromCollection(
    username: string,
    collectionId: number | string,
    limit: number = 0
  ): Promise<Wallpaper[]> {
    const max = parseInput(CollectionLimitSchema, limit, 'Invalid limit');
    const path = `/collections/${encodeURIComponent(username)}/${encodeURIComponent(String(collectionId))}`;

    const wallpapers: Wallpaper[] = [];
    let page = 1;
    let lastPage = 1;

    do {
      const response = await this.request(path, CollectionPageResponseSchema, { page: String(page) });
      wallpapers.push(...response.data);
      lastPage = response.meta.last_page;
      page++;
    } while (page <= lastPage && (max === 0 || wallpapers.length < max));

    this.log.debug({ username, collectionId, count: wallpapers.length, pages: page - 1 }, 'Collection fetched');

    return max === 0 ? wallpapers : wallpapers.slice(0, max);
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Search wallpapers. Zero matches resolve to an empty array.
   * @throws {ValidationError} When raw parameters carry malformed masks
   * @throws {AuthenticationRequiredError} When NSFW is requested without an API key
   */
  async search(params: SearchInput = new SearchParameters()): Promise<Wallpaper[]> {
    const result = await this.searchPage(params);
    return result.data;
  }

  /**
   * Search returning the page meta (current/last page, total, seed) as well
   */
  async searchPage(params: SearchInput = new SearchParameters()): Promise<SearchResult> {
    const query = toQueryParams(params);

    if (query.purity?.[2] === '1') {
      this.requireApiKey('NSFW search requires an API key');
    }

    return this.request('/search', SearchResponseSchema, query);
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private requireApiKey(message: string): void {
    if (!this.apiKey) {
      throw new AuthenticationRequiredError(message);
    }
  }

  /**
   * Wait until `requestDelayMs` has passed since the previous request
   */
  private async waitForRateLimit(): Promise<void> {
    const timeSinceLastRequest = Date.now() - this.lastRequestTime;
    if (timeSinceLastRequest < this.requestDelayMs) {
      await sleep(this.requestDelayMs - timeSinceLastRequest);
    }
  }

  private buildUrl(endpoint: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
    };
    if (this.apiKey) {
      headers['X-API-Key'] = this.apiKey;
    }
    return headers;
  }

  /**
   * One GET against the API, classified by status and validated against `schema`.
   * The timeout and `close()` stay armed until the body has been read.
   */
  private async request<S extends z.ZodType>(
    endpoint: string,
    schema: S,
    params: Record<string, string> = {}
  ): Promise<z.output<S>> {
    if (this.isClosed()) {
      throw new RequestError('Client is closed');
    }

    await this.waitForRateLimit();

    const url = this.buildUrl(endpoint, params);
    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.lifecycle.signal.addEventListener('abort', onClose, { once: true });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const start = Date.now();

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: this.buildHeaders(),
          signal: controller.signal,
        });
      } catch (err) {
        throw this.transportError(endpoint, controller.signal, err);
      }

      this.log.debug(
        { endpoint, params, status: response.status, duration: Date.now() - start },
        `GET ${endpoint} ${response.status}`
      );

      if (!response.ok) {
        await response.body?.cancel();
        throw this.errorForStatus(endpoint, response);
      }

      let body: unknown;
      try {
        body = await untilAborted(response.json(), controller.signal);
      } catch (err) {
        if (controller.signal.aborted) {
          throw this.transportError(endpoint, controller.signal, err);
        }
        throw new RequestError(
          `GET ${endpoint} returned invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
          response.status
        );
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        this.log.warn({ endpoint, issues: parsed.error.issues }, 'Unexpected response shape');
        throw new RequestError(`GET ${endpoint} returned an unexpected response shape`, response.status);
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
      this.lifecycle.signal.removeEventListener('abort', onClose);
      this.lastRequestTime = Date.now();
    }
  }

  private transportError(endpoint: string, signal: AbortSignal, err: unknown): RequestError {
    const reason = this.isClosed()
      ? 'Client is closed'
      : signal.aborted
        ? `Request timed out after ${this.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
    this.log.error({ endpoint, error: reason }, 'Request failed');
    return new RequestError(`GET ${endpoint} failed: ${reason}`);
  }

  private errorForStatus(endpoint: string, response: Response): Error {
    switch (response.status) {
      case 401:
        this.log.warn({ endpoint, hasApiKey: this.hasApiKey() }, 'API key rejected');
        return new AuthenticationRequiredError(
          this.apiKey ? 'API key is not valid' : describeHttpStatus(401),
          401
        );
      case 404:
        return new NotFoundError(`${describeHttpStatus(404)} (${endpoint})`);
      case 429: {
        const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
        this.log.warn({ endpoint, retryAfter }, 'Rate limit exceeded (429)');
        return new RateLimitError(retryAfter);
      }
      default:
        return new RequestError(
          `HTTP ${response.status}: ${response.statusText || describeHttpStatus(response.status)}`,
          response.status
        );
    }
  }
}

// =============================================================================
// Scoped Usage
// =============================================================================

/**
 * Run `fn` with a fresh client and close it afterwards, even on failure
 */
export async function withWallhavenClient<T>(
  options: WallhavenClientOptions,
  fn: (client: WallhavenClient) => Promise<T>
): Promise<T> {
  const client = new WallhavenClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
