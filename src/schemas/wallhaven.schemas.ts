/**
 * Wallhaven Schemas
 *
 * Zod schemas for builder input and for the JSON bodies returned by the API.
 * Response objects pass unknown fields through so callers see the payload
 * the service sent.
 */

import { z } from 'zod';
import { fromZodError } from '../services/wallhaven-errors.js';

// =============================================================================
// Search Input Schemas
// =============================================================================

export const BitMaskSchema = z.string().regex(/^[01]{3}$/, 'Expected a 3 character mask of 0 and 1');

export const PageSchema = z.coerce
  .number({ message: 'Page must be a number' })
  .int('Page must be an integer')
  .positive('Page must be greater than zero');

export const CollectionLimitSchema = z
  .number()
  .int('Limit must be an integer')
  .nonnegative('Limit cannot be negative');

export const RequestDelaySchema = z
  .number()
  .nonnegative('Delay cannot be negative');

export const ResolutionSchema = z.string().regex(/^\d+x\d+$/, 'Expected WIDTHxHEIGHT, e.g. 1920x1080');

export const RatioSchema = z.string().regex(/^\d+x\d+$/, 'Expected a ratio such as 16x9');

export const ColorSchema = z
  .string()
  .transform((value) => value.replace(/^#/, '').toLowerCase())
  .pipe(z.string().regex(/^[0-9a-f]{6}$/, 'Expected a 6 digit hex colour'));

export const SeedSchema = z.string().regex(/^[a-zA-Z0-9]{6}$/, 'Seed must be 6 alphanumeric characters');

export const TagNameSchema = z.string().trim().min(1, 'Tag names cannot be empty');

export const UsernameSchema = z.string().trim().min(1, 'Username cannot be empty');

/**
 * Raw search parameters supplied directly by a caller
 */
export const RawSearchParamsSchema = z
  .record(z.string(), z.string())
  .superRefine((params, ctx) => {
    for (const key of ['categories', 'purity'] as const) {
      const value = params[key];
      if (value !== undefined && !BitMaskSchema.safeParse(value).success) {
        ctx.addIssue({
          code: 'custom',
          path: [key],
          message: 'Expected a 3 character mask of 0 and 1',
        });
      }
    }
  });

// =============================================================================
// Response Schemas
// =============================================================================

export const UploaderSchema = z
  .object({
    username: z.string(),
    group: z.string(),
    avatar: z.record(z.string(), z.string()),
  })
  .passthrough();

export const TagSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    alias: z.string().nullable(),
    category_id: z.number(),
    category: z.string(),
    purity: z.string(),
    created_at: z.string(),
  })
  .passthrough();

export const ThumbsSchema = z
  .object({
    large: z.string(),
    original: z.string(),
    small: z.string(),
  })
  .passthrough();

export const WallpaperSchema = z
  .object({
    id: z.string(),
    url: z.string(),
    short_url: z.string(),
    views: z.number(),
    favorites: z.number(),
    source: z.string(),
    purity: z.string(),
    category: z.string(),
    dimension_x: z.number(),
    dimension_y: z.number(),
    resolution: z.string(),
    ratio: z.string(),
    file_size: z.number(),
    file_type: z.string(),
    created_at: z.string(),
    colors: z.array(z.string()),
    path: z.string(),
    thumbs: ThumbsSchema,
    uploader: UploaderSchema.optional(),
    tags: z.array(TagSchema).optional(),
  })
  .passthrough();

export const UserSettingsSchema = z
  .object({
    thumb_size: z.string(),
    per_page: z.string(),
    purity: z.array(z.string()),
    categories: z.array(z.string()),
    resolutions: z.array(z.string()),
    aspect_ratios: z.array(z.string()),
    toplist_range: z.string(),
    tag_blacklist: z.array(z.string()),
    user_blacklist: z.array(z.string()),
  })
  .partial()
  .passthrough();

export const CollectionSchema = z
  .object({
    id: z.number(),
    label: z.string(),
    views: z.number(),
    public: z.number(),
    count: z.number(),
  })
  .passthrough();

export const PageMetaSchema = z
  .object({
    current_page: z.number(),
    last_page: z.number(),
    per_page: z.coerce.number(),
    total: z.number(),
  })
  .passthrough();

export const SearchMetaSchema = PageMetaSchema.extend({
  query: z.union([z.string(), z.object({ id: z.number(), tag: z.string() }).passthrough()]).nullable().optional(),
  seed: z.string().nullable().optional(),
});

// Every endpoint wraps its payload in `{ data }`; paginated ones add `meta`
export const WallpaperResponseSchema = z.object({ data: WallpaperSchema });
export const TagResponseSchema = z.object({ data: TagSchema });
export const UserSettingsResponseSchema = z.object({ data: UserSettingsSchema });
export const CollectionListResponseSchema = z.object({ data: z.array(CollectionSchema) });

export const CollectionPageResponseSchema = z.object({
  data: z.array(WallpaperSchema),
  meta: PageMetaSchema,
});

export const SearchResponseSchema = z.object({
  data: z.array(WallpaperSchema),
  meta: SearchMetaSchema,
});

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse caller input, converting zod failures to ValidationError
 */
export function parseInput<T>(schema: z.ZodType<T>, value: unknown, message: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw fromZodError(message, result.error);
  }
  return result.data;
}

// =============================================================================
// Type Exports
// =============================================================================

export type Uploader = z.infer<typeof UploaderSchema>;
export type Tag = z.infer<typeof TagSchema>;
export type Thumbs = z.infer<typeof ThumbsSchema>;
export type Wallpaper = z.infer<typeof WallpaperSchema>;
export type UserSettings = z.infer<typeof UserSettingsSchema>;
export type Collection = z.infer<typeof CollectionSchema>;
export type PageMeta = z.infer<typeof PageMetaSchema>;
export type SearchMeta = z.infer<typeof SearchMetaSchema>;
export type SearchResult = z.infer<typeof SearchResponseSchema>;
