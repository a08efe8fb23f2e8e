/**
 * Runtime configuration.
 *
 * Values are read from process.env on every call so tests (and a
 * re-read after `.env` loading) always see the current environment.
 * `.env` itself is loaded by the process entry points, never here.
 */

// ============================================================================
// Server
// ============================================================================

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigin: boolean | string[];
  rateLimitMax: number;
  rateLimitWindow: string;
  bodyLimitBytes: number;
  redisUrl?: string;
}

export function getServerConfig(): ServerConfig {
  const config: ServerConfig = {
    host: envString('HOST', '0.0.0.0'),
    port: envInt('PORT', 4000),
    corsOrigin: parseCorsOrigin(process.env.CORS_ORIGIN),
    rateLimitMax: envInt('RATE_LIMIT_MAX', 100),
    rateLimitWindow: envString('RATE_LIMIT_WINDOW', '1 minute'),
    bodyLimitBytes: envInt('BODY_LIMIT_BYTES', 1024 * 1024),
  };
  const redisUrl = process.env.REDIS_URL?.trim();
  if (redisUrl) config.redisUrl = redisUrl;
  return config;
}

function parseCorsOrigin(raw: string | undefined): boolean | string[] {
  if (!raw || raw.trim() === '*') return true;
  return splitList(raw);
}

// ============================================================================
// Action authentication
// ============================================================================

export interface AuthConfig {
  apiKeys: string[];
  requireKey: boolean;
}

export function getAuthConfig(): AuthConfig {
  return {
    apiKeys: splitList(process.env.ACTIONS_API_KEY || ''),
    requireKey: envBool('ACTIONS_REQUIRE_KEY', false),
  };
}

// ============================================================================
// ClinicalTrials.gov
// ============================================================================

export interface CtgovConfig {
  baseUrl: string;
  timeoutMs: number;
  cacheSeconds: number;
  userAgent: string;
}

export function getCtgovConfig(): CtgovConfig {
  return {
    baseUrl: envString('CTGOV_BASE_URL', 'https://clinicaltrials.gov').replace(/\/+$/, ''),
    timeoutMs: envInt('CTGOV_TIMEOUT_MS', 30_000),
    cacheSeconds: envInt('CTGOV_CACHE_SECONDS', 3600),
    userAgent: envString('CTGOV_USER_AGENT', 'people-curation-actions/1.0'),
  };
}

// ============================================================================
// Utilities
// ============================================================================

export function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function envString(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return defaultValue;
  return value.trim();
}
