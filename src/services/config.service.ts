/**
 * Configuration Service
 *
 * Resolves client configuration from explicit options and WALLHAVEN_* environment
 * variables (optionally loaded from `.env`). Explicit options always win;
 * `apiKey: null` opts out of the environment key.
 */

import '../env.js';
import { z } from 'zod';
import { fromZodError } from './wallhaven-errors.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_BASE_URL = 'https://wallhaven.cc/api/v1';
export const DEFAULT_USER_AGENT = 'wallhaven-api-client/0.1.0 (+https://wallhaven.cc/help/api)';

// Wallhaven allows 45 requests per minute; 500ms keeps bursts polite
export const DEFAULT_REQUEST_DELAY_MS = 500;
export const DEFAULT_TIMEOUT_MS = 10_000;

// =============================================================================
// Type Definitions
// =============================================================================

export const ClientConfigSchema = z.object({
  apiKey: z.string().trim().min(1).optional(),
  baseUrl: z.string().url('Base URL must be an absolute URL').default(DEFAULT_BASE_URL),
  requestDelayMs: z.coerce.number().nonnegative().default(DEFAULT_REQUEST_DELAY_MS),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export interface ClientConfigOverrides {
  /** `null` means no key, even when WALLHAVEN_API_KEY is set */
  apiKey?: string | null;
  baseUrl?: string;
  requestDelayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
}

// =============================================================================
// Environment
// =============================================================================

/**
 * Read WALLHAVEN_* variables. Empty strings count as unset.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): ClientConfigOverrides {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const delay = pick('WALLHAVEN_REQUEST_DELAY_MS');
  const timeout = pick('WALLHAVEN_TIMEOUT_MS');

  return {
    apiKey: pick('WALLHAVEN_API_KEY'),
    baseUrl: pick('WALLHAVEN_BASE_URL'),
    requestDelayMs: delay === undefined ? undefined : Number(delay),
    timeoutMs: timeout === undefined ? undefined : Number(timeout),
    userAgent: pick('WALLHAVEN_USER_AGENT'),
  };
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Merge overrides over environment values and validate the result.
 * @throws {ValidationError} When a value is malformed
 */
export function resolveClientConfig(
  overrides: ClientConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const fromEnv = readEnvConfig(env);
  const merged: ClientConfigOverrides = {
    apiKey: overrides.apiKey === null ? undefined : (overrides.apiKey ?? fromEnv.apiKey),
    baseUrl: overrides.baseUrl ?? fromEnv.baseUrl,
    requestDelayMs: overrides.requestDelayMs ?? fromEnv.requestDelayMs,
    timeoutMs: overrides.timeoutMs ?? fromEnv.timeoutMs,
    userAgent: overrides.userAgent ?? fromEnv.userAgent,
  };

  const result = ClientConfigSchema.safeParse(merged);
  if (!result.success) {
    throw fromZodError('Invalid Wallhaven client configuration', result.error);
  }

  // Endpoint paths carry their own leading slash
  return { ...result.data, baseUrl: result.data.baseUrl.replace(/\/+$/, '') };
}
