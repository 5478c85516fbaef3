/**
 * Search Parameters
 *
 * Mutable builder for Wallhaven search filters. Holds categories, purity,
 * sorting, toplist range, order, page, the free-text query and tag/user filter
 * tokens, and renders them to the flat string mapping the /search endpoint takes.
 *
 * Usage:
 *
 *   const params = new SearchParameters()
 *     .setCategories(true, false, false)
 *     .setSorting('toplist')
 *     .setRange('Last Three Days')
 *     .includeTags(['mountains']);
 *
 *   const wallpapers = await client.search(params);
 */

import {
  ColorSchema,
  PageSchema,
  RatioSchema,
  ResolutionSchema,
  SeedSchema,
  TagNameSchema,
  UsernameSchema,
  parseInput,
} from '../schemas/wallhaven.schemas.js';
import { ValidationError } from './wallhaven-errors.js';

// =============================================================================
// Types
// =============================================================================

export const SORTINGS = ['date_added', 'relevance', 'random', 'views', 'favorites', 'toplist'] as const;
export type Sorting = (typeof SORTINGS)[number];

export const TOP_RANGES = ['1d', '3d', '1w', '1M', '3M', '6M', '1y'] as const;
export type TopRange = (typeof TOP_RANGES)[number];

export const ORDERS = ['asc', 'desc'] as const;
export type Order = (typeof ORDERS)[number];

export type QueryTokenKind = 'include' | 'exclude' | 'user';

export interface QueryToken {
  kind: QueryTokenKind;
  value: string;
}

/**
 * Serialized parameters, ready to be used as a query string.
 * Optional filters are only present when set.
 */
export interface SearchParams {
  [key: string]: string | undefined;
  categories: string;
  purity: string;
  sorting: Sorting;
  topRange: TopRange;
  order: Order;
  page: string;
  q: string;
  atleast?: string;
  resolutions?: string;
  ratios?: string;
  colors?: string;
  seed?: string;
}

interface OptionalFilters {
  atleast?: string;
  resolutions?: string[];
  ratios?: string[];
  colors?: string;
  seed?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_CATEGORIES = '111';
export const DEFAULT_PURITY = '100';
export const DEFAULT_SORTING: Sorting = 'date_added';
export const DEFAULT_TOP_RANGE: TopRange = '1M';
export const DEFAULT_ORDER: Order = 'desc';
export const DEFAULT_PAGE = 1;

const SORTING_ALIASES: Record<string, Sorting> = {
  date: 'date_added',
  top: 'toplist',
  fav: 'favorites',
};

const RANGE_LABELS: Record<string, TopRange> = {
  last_day: '1d',
  last_three_days: '3d',
  last_week: '1w',
  last_month: '1M',
  last_three_months: '3M',
  last_six_months: '6M',
  last_year: '1y',
};

const ORDER_ALIASES: Record<string, Order> = {
  asc: 'asc',
  ascending: 'asc',
  desc: 'desc',
  descending: 'desc',
};

const TOKEN_PREFIX: Record<QueryTokenKind, string> = {
  include: '+',
  exclude: '-',
  user: '@',
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Lowercase and collapse spaces/hyphens to underscores ("Date Added" -> "date_added")
 */
export function normalizeOption(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Render three flags as a "101"-style mask
 */
export function toBitMask(flags: readonly [boolean, boolean, boolean]): string {
  return flags.map((flag) => (flag ? '1' : '0')).join('');
}

function isSorting(value: string): value is Sorting {
  return (SORTINGS as readonly string[]).includes(value);
}

/**
 * Strip a leading operator the caller already supplied so it isn't doubled,
 * then validate what is left
 */
function tokenValue(kind: QueryTokenKind, raw: string): string {
  const prefix = TOKEN_PREFIX[kind];
  const trimmed = raw.trim();
  const name = trimmed.startsWith(prefix) ? trimmed.slice(prefix.length) : trimmed;
  return kind === 'user'
    ? parseInput(UsernameSchema, name, 'Invalid username')
    : parseInput(TagNameSchema, name, 'Invalid tag');
}

// =============================================================================
// Builder
// =============================================================================

export class SearchParameters {
  private categories = DEFAULT_CATEGORIES;
  private purity = DEFAULT_PURITY;
  private sorting: Sorting = DEFAULT_SORTING;
  private topRange: TopRange = DEFAULT_TOP_RANGE;
  private order: Order = DEFAULT_ORDER;
  private page = DEFAULT_PAGE;
  private query = '';
  private tokens: QueryToken[] = [];
  private filters: OptionalFilters = {};

  /**
   * Turn categories on or off. An all-off mask is accepted but matches nothing.
   */
  setCategories(general = true, anime = true, people = true): this {
    this.categories = toBitMask([general, anime, people]);
    return this;
  }

  /**
   * Turn purities on or off. NSFW searches need an API key on the client.
   */
  setPurity(sfw = true, sketchy = false, nsfw = false): this {
    this.purity = toBitMask([sfw, sketchy, nsfw]);
    return this;
  }

  /**
   * Set the sort method ("Date Added", "views", "top", ...)
   * @throws {ValidationError} On an unknown sorting
   */
  setSorting(value: string): this {
    const normalized = normalizeOption(value);
    const sorting = isSorting(normalized) ? normalized : SORTING_ALIASES[normalized];
    if (!sorting) {
      throw new ValidationError(`Unknown sorting: ${value}`, [{ path: 'sorting', message: `Expected one of ${SORTINGS.join(', ')}` }]);
    }
    this.sorting = sorting;
    return this;
  }

  /**
   * Set the toplist range from a label ("Last Three Days") or a code ("3d").
   * Only used by the service when sorting is toplist.
   * @throws {ValidationError} On an unknown range
   */
  setRange(value: string): this {
    const trimmed = value.trim();
    const byCode = TOP_RANGES.find((code) => code.toLowerCase() === trimmed.toLowerCase());
    const range = byCode ?? RANGE_LABELS[normalizeOption(trimmed)];
    if (!range) {
      throw new ValidationError(`Unknown range: ${value}`, [{ path: 'topRange', message: `Expected one of ${TOP_RANGES.join(', ')}` }]);
    }
    this.topRange = range;
    return this;
  }

  /**
   * @throws {ValidationError} Unless asc/desc (or ascending/descending)
   */
  setOrder(value: string): this {
    const order = ORDER_ALIASES[normalizeOption(value)];
    if (!order) {
      throw new ValidationError(`Unknown order: ${value}`, [{ path: 'order', message: 'Expected asc or desc' }]);
    }
    this.order = order;
    return this;
  }

  /**
   * @throws {ValidationError} When not a positive integer
   */
  setPage(page: number | string): this {
    this.page = parseInput(PageSchema, page, 'Invalid page');
    return this;
  }

  /**
   * Replace the free-text query. Tag and user tokens are kept.
   */
  setSearchQuery(query: string): this {
    this.query = query;
    return this;
  }

  /**
   * Empty the free-text query, and the tag/user tokens too when asked
   */
  clearSearchQuery(alsoClearFilters = false): this {
    this.query = '';
    if (alsoClearFilters) {
      this.tokens = [];
    }
    return this;
  }

  includeTags(tags: readonly string[]): this {
    return this.addTokens('include', tags);
  }

  excludeTags(tags: readonly string[]): this {
    return this.addTokens('exclude', tags);
  }

  filterByUser(username: string): this {
    return this.addTokens('user', [username]);
  }

  /**
   * Tokens in the order they were added
   */
  getQueryTokens(): QueryToken[] {
    return this.tokens.map((token) => ({ ...token }));
  }

  // ---------------------------------------------------------------------------
  // Optional filters
  // ---------------------------------------------------------------------------

  /**
   * Minimum resolution ("1920x1080"). Pass null to remove.
   */
  setMinimumResolution(resolution: string | null): this {
    if (resolution === null) {
      delete this.filters.atleast;
      return this;
    }
    this.filters.atleast = parseInput(ResolutionSchema, resolution.trim(), 'Invalid minimum resolution');
    return this;
  }

  /**
   * Exact resolutions ("1920x1080"). An empty list removes the filter.
   */
  setResolutions(resolutions: readonly string[]): this {
    this.filters.resolutions = resolutions.map((r) => parseInput(ResolutionSchema, r.trim(), 'Invalid resolution'));
    return this;
  }

  /**
   * Aspect ratios ("16x9"). An empty list removes the filter.
   */
  setRatios(ratios: readonly string[]): this {
    this.filters.ratios = ratios.map((r) => parseInput(RatioSchema, r.trim(), 'Invalid ratio'));
    return this;
  }

  /**
   * Search by colour ("#660000" or "660000"). Pass null to remove.
   */
  setColor(color: string | null): this {
    if (color === null) {
      delete this.filters.colors;
      return this;
    }
    this.filters.colors = parseInput(ColorSchema, color.trim(), 'Invalid colour');
    return this;
  }

  /**
   * Seed for stable paging through random results. Pass null to remove.
   */
  setSeed(seed: string | null): this {
    if (seed === null) {
      delete this.filters.seed;
      return this;
    }
    this.filters.seed = parseInput(SeedSchema, seed, 'Invalid seed');
    return this;
  }

  // ---------------------------------------------------------------------------
  // Reset
  // ---------------------------------------------------------------------------

  /**
   * Restore every field to its default
   */
  resetParameters(): this {
    this.categories = DEFAULT_CATEGORIES;
    this.purity = DEFAULT_PURITY;
    this.sorting = DEFAULT_SORTING;
    this.topRange = DEFAULT_TOP_RANGE;
    this.order = DEFAULT_ORDER;
    this.page = DEFAULT_PAGE;
    this.query = '';
    this.tokens = [];
    this.filters = {};
    return this;
  }

  /**
   * Clear the query and tag/user tokens, keeping everything else
   */
  resetFilters(): this {
    return this.clearSearchQuery(true);
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  /**
   * Query text followed by the tokens, space separated
   */
  buildQuery(): string {
    const parts = [this.query, ...this.tokens.map((t) => `${TOKEN_PREFIX[t.kind]}${t.value}`)];
    return parts.filter((part) => part.length > 0).join(' ');
  }

  /**
   * Current state as a fresh mapping of query parameters
   */
  getParams(): SearchParams {
    const params: SearchParams = {
      categories: this.categories,
      purity: this.purity,
      sorting: this.sorting,
      topRange: this.topRange,
      order: this.order,
      page: String(this.page),
      q: this.buildQuery(),
    };

    const { atleast, resolutions, ratios, colors, seed } = this.filters;
    if (atleast) params.atleast = atleast;
    if (resolutions && resolutions.length > 0) params.resolutions = resolutions.join(',');
    if (ratios && ratios.length > 0) params.ratios = ratios.join(',');
    if (colors) params.colors = colors;
    if (seed) params.seed = seed;

    return params;
  }

  /**
   * True when the NSFW purity bit is set
   */
  requiresApiKey(): boolean {
    return this.purity[2] === '1';
  }

  private addTokens(kind: QueryTokenKind, values: readonly string[]): this {
    const added = values.map((value) => ({ kind, value: tokenValue(kind, value) }));
    this.tokens.push(...added);
    return this;
  }
}
