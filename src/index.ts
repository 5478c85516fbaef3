/**
 * Wallhaven API client
 *
 *   import { WallhavenClient, SearchParameters } from 'wallhaven-api-client';
 *
 *   const client = new WallhavenClient({ apiKey: process.env.WALLHAVEN_API_KEY });
 *   const wallpaper = await client.getWallpaperInfo('r25peq');
 */

export {
  WallhavenClient,
  withWallhavenClient,
  parseRetryAfter,
  type FetchLike,
  type SearchInput,
  type WallhavenClientOptions,
} from './services/wallhaven.service.js';

export {
  SearchParameters,
  SORTINGS,
  TOP_RANGES,
  ORDERS,
  type Order,
  type QueryToken,
  type QueryTokenKind,
  type SearchParams,
  type Sorting,
  type TopRange,
} from './services/search-parameters.service.js';

export {
  WallhavenError,
  ValidationError,
  AuthenticationRequiredError,
  NotFoundError,
  RateLimitError,
  RequestError,
  isWallhavenError,
  type ValidationIssue,
  type WallhavenErrorCode,
} from './services/wallhaven-errors.js';

export {
  resolveClientConfig,
  DEFAULT_BASE_URL,
  DEFAULT_REQUEST_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  type ClientConfig,
  type ClientConfigOverrides,
} from './services/config.service.js';

export { createServiceLogger, type Logger } from './services/logger.service.js';

export type {
  Collection,
  PageMeta,
  SearchMeta,
  SearchResult,
  Tag,
  Thumbs,
  Uploader,
  UserSettings,
  Wallpaper,
} from './schemas/wallhaven.schemas.js';
