import { z } from 'zod/v4';

import { DeployError } from './errors.js';

export interface AppConfig {
  portalUrl?: string;
  rsUser?: string;
  rsPass?: string;
  requestTimeoutMs: number;
  readRetries: number;
  readRetryBackoffMs: number;

  dryRun: boolean;
  manifestPath: string;

  logLevel: string;
  logPretty: boolean;

  journalMaxEntries: number;
  journalPath?: string;
}

const envSchema = z.object({
  RS_PORTAL_URL: z.string().optional(),
  RS_USER: z.string().optional(),
  RS_PASS: z.string().optional(),
  RS_TIMEOUT_MS: z.string().optional(),
  RS_READ_RETRIES: z.string().optional(),
  RS_READ_RETRY_BACKOFF_MS: z.string().optional(),

  DEPLOY_DRY_RUN: z.string().optional(),
  DEPLOY_MANIFEST_PATH: z.string().optional(),

  DEPLOY_LOG_LEVEL: z.string().optional(),
  DEPLOY_LOG_PRETTY: z.string().optional(),

  DEPLOY_JOURNAL_MAX_ENTRIES: z.string().optional(),
  DEPLOY_JOURNAL_PATH: z.string().optional()
});

export function normalizeBaseUrl(raw: string, source = 'RS_PORTAL_URL'): string {
  const trimmed = raw.trim().replace(/\/+$/, '');
  try {
    const parsed = new URL(trimmed);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`unsupported protocol ${parsed.protocol}`);
    }
    // Credentials belong in RS_USER/RS_PASS, never in a URL that ends up in logs.
    parsed.username = '';
    parsed.password = '';
    return parsed.toString().replace(/\/+$/, '');
  } catch (error) {
    throw new DeployError('INVALID_CONFIG', `Invalid ${source}: ${raw}`, { cause: error });
  }
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const portalUrlRaw = parseOptionalString(parsed.RS_PORTAL_URL);

  return {
    portalUrl: portalUrlRaw ? normalizeBaseUrl(portalUrlRaw) : undefined,
    rsUser: parseOptionalString(parsed.RS_USER),
    rsPass: parseOptionalString(parsed.RS_PASS),
    requestTimeoutMs: parseNumber(parsed.RS_TIMEOUT_MS, 30_000, 500, 600_000),
    readRetries: parseNumber(parsed.RS_READ_RETRIES, 2, 0, 10),
    readRetryBackoffMs: parseNumber(parsed.RS_READ_RETRY_BACKOFF_MS, 250, 10, 10_000),

    dryRun: parseBoolean(parsed.DEPLOY_DRY_RUN, false),
    manifestPath: parseOptionalString(parsed.DEPLOY_MANIFEST_PATH) ?? 'deploy.manifest.json',

    logLevel: parseOptionalString(parsed.DEPLOY_LOG_LEVEL) ?? 'info',
    logPretty: parseBoolean(parsed.DEPLOY_LOG_PRETTY, false),

    journalMaxEntries: parseNumber(parsed.DEPLOY_JOURNAL_MAX_ENTRIES, 5_000, 100, 1_000_000),
    journalPath: parseOptionalString(parsed.DEPLOY_JOURNAL_PATH)
  };
}
