import { z } from 'zod';
import * as path from 'path';
import { ConfigError } from './errors';

// Zod schema for type safety; every field has a default so `{}` is valid
export const ArchiverConfigSchema = z.object({
  siteOrigin: z.string().url().default('https://example.com'),
  listingPath: z.string().regex(/^\/[^?#]*[^/?#]$/, 'listingPath must start with "/" and not end with "/"').default('/blog'),
  outputDir: z.string().min(1).default('output'),
  archiveFileName: z.string().min(1).default('archive.md'),
  checkpointFileName: z.string().min(1).default('checkpoint.json'),
  archiveTitle: z.string().min(1).default('Blog Archive'),
  vendorName: z.string().min(1).default('Example'),
  workers: z.number().int().min(1).max(64).default(10),
  timeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().min(1).default('Mozilla/5.0 (compatible; BlogArchiver/1.0)'),
  minContentHtmlLength: z.number().int().min(0).default(100),
  maxPages: z.number().int().min(1).default(200),
});

export type ArchiverConfig = z.infer<typeof ArchiverConfigSchema>;
export type ArchiverConfigInput = z.input<typeof ArchiverConfigSchema>;

type Env = Record<string, string | undefined>;

const ENV_STRING_KEYS = {
  ARCHIVER_SITE_ORIGIN: 'siteOrigin',
  ARCHIVER_LISTING_PATH: 'listingPath',
  ARCHIVER_OUTPUT_DIR: 'outputDir',
  ARCHIVER_ARCHIVE_FILE: 'archiveFileName',
  ARCHIVER_CHECKPOINT_FILE: 'checkpointFileName',
  ARCHIVER_TITLE: 'archiveTitle',
  ARCHIVER_VENDOR_NAME: 'vendorName',
  ARCHIVER_USER_AGENT: 'userAgent',
} as const;

const ENV_NUMBER_KEYS = {
  ARCHIVER_WORKERS: 'workers',
  ARCHIVER_TIMEOUT_MS: 'timeoutMs',
  ARCHIVER_MAX_PAGES: 'maxPages',
} as const;

/**
 * Read ARCHIVER_* variables. Numeric values that do not parse are passed
 * through as NaN and fail validation.
 */
export function configFromEnv(env: Env): ArchiverConfigInput {
  const fromEnv: ArchiverConfigInput = {};

  for (const [name, key] of Object.entries(ENV_STRING_KEYS)) {
    const value = env[name];
    if (value) fromEnv[key] = value;
  }

  for (const [name, key] of Object.entries(ENV_NUMBER_KEYS)) {
    const value = env[name];
    if (value) fromEnv[key] = Number(value);
  }

  return fromEnv;
}

/**
 * Build the effective configuration: defaults < environment < overrides
 */
export function resolveConfig(overrides: ArchiverConfigInput = {}, env: Env = process.env): ArchiverConfig {
  const result = ArchiverConfigSchema.safeParse({ ...configFromEnv(env), ...overrides });

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid archiver configuration: ${issues.join(', ')}`, { issues });
  }

  return result.data;
}

export function listingUrl(config: ArchiverConfig): string {
  return config.siteOrigin.replace(/\/+$/, '') + config.listingPath;
}

export function archivePath(config: ArchiverConfig): string {
  return path.join(config.outputDir, config.archiveFileName);
}

export function checkpointPath(config: ArchiverConfig): string {
  return path.join(config.outputDir, config.checkpointFileName);
}
