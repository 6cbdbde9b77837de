import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface SupabaseConfig {
  url?: string;
  key?: string;
  productsTable: string;
  mediaTable: string;
}

export interface Config {
  env: string;
  currencyApiUrl: string;
  weatherApiUrl: string;
  requestTimeoutMs: number;
  mediaConcurrency: number;
  supabase: SupabaseConfig;
  http: {
    port: number;
    host: string;
  };
}

export const DEFAULT_CURRENCY_API_URL = 'https://api.frankfurter.app/latest';
export const DEFAULT_WEATHER_API_URL = 'https://api.open-meteo.com/v1/forecast';
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MEDIA_CONCURRENCY = 4;
export const DEFAULT_HTTP_PORT = 8787;

/**
 * Parse a positive integer from the environment, falling back on anything
 * missing, non-numeric or below 1.
 */
function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}

export function getConfig(): Config {
  const env = process.env;

  return {
    env: env.TOOLBOX_ENV || 'dev',
    currencyApiUrl: nonEmpty(env.TOOLBOX_CURRENCY_API_URL) ?? DEFAULT_CURRENCY_API_URL,
    weatherApiUrl: nonEmpty(env.TOOLBOX_WEATHER_API_URL) ?? DEFAULT_WEATHER_API_URL,
    requestTimeoutMs: positiveInt(env.TOOLBOX_HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    mediaConcurrency: positiveInt(env.TOOLBOX_MEDIA_CONCURRENCY, DEFAULT_MEDIA_CONCURRENCY),
    supabase: {
      url: nonEmpty(env.SUPABASE_URL),
      key: nonEmpty(env.SUPABASE_KEY) ?? nonEmpty(env.SUPABASE_ANON_KEY),
      productsTable: nonEmpty(env.TOOLBOX_PRODUCTS_TABLE) ?? 'products',
      mediaTable: nonEmpty(env.TOOLBOX_MEDIA_TABLE) ?? 'product_media',
    },
    http: {
      port: positiveInt(env.TOOLBOX_HTTP_PORT, DEFAULT_HTTP_PORT),
      host: nonEmpty(env.TOOLBOX_HTTP_HOST) ?? '0.0.0.0',
    },
  };
}

// ============================================================================
// Package Info
// ============================================================================

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export interface PackageInfo {
  name: string;
  version: string;
}

function readPackageInfo(): PackageInfo {
  // ../package.json resolves from both src/ and dist/
  const pkgPath = path.join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    if (parsed.success) return parsed.data;
  } catch (err) {
    log(`Could not read ${pkgPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return { name: 'toolbox-mcp', version: '0.0.0' };
}

export const PKG: PackageInfo = readPackageInfo();

// ============================================================================
// Logging
// ============================================================================
// stdout carries the stdio transport, so everything goes to stderr.

export function log(message: string, ...args: unknown[]): void {
  const config = getConfig();
  if (config.env === 'dev') {
    console.error(`[toolbox-mcp] ${message}`, ...args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  console.error(`[toolbox-mcp] WARN ${message}`, ...args);
}
