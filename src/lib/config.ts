/**
 * Hazard Relay: Configuration
 *
 * Reads the environment once and produces a frozen RelayConfig that is passed
 * explicitly to every component. Nothing else reads app settings from process.env.
 */

import { z } from 'zod';
import { SourceDescriptorSchema, type SourceDescriptor } from '../types';
import { ConfigError } from './errors';

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_SOURCES: SourceDescriptor[] = [
  {
    name: 'bom-qld-rss',
    kind: 'rss',
    url: 'https://reg.bom.gov.au/fwo/IDZ00056.warnings_qld.xml',
    priority: 1,
    category: 'qld-warnings',
    authoritativeOnEmpty: true,
  },
  {
    name: 'bom-qld-page',
    kind: 'html',
    url: 'https://www.bom.gov.au/products/warn_qld.shtml',
    priority: 2,
    category: 'qld-warnings',
    authoritativeOnEmpty: false,
  },
];

export const DEFAULT_KEYWORDS = [
  'Warning',
  'Severe',
  'Thunderstorm',
  'Cyclone',
  'Flood',
  'Heatwave',
  'Tsunami',
  'Fire Weather',
];

export const DEFAULT_EXCLUSIONS = ['Warnings current'];

// ============================================================
// SCHEMA
// ============================================================

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', '']);

const booleanFlag = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = (value ?? '').trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const csvList = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform(value => {
      const items = (value ?? '')
        .split(',')
        .map(s => s.trim())
        .filter(Boolean);
      return items.length > 0 ? items : fallback;
    });

const timeoutMs = (fallback: number) =>
  z.coerce.number().int().positive().max(300_000).default(fallback);

const sourcesJson = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || value.trim() === '') return DEFAULT_SOURCES;
    try {
      const decoded: unknown = JSON.parse(value);
      return decoded;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.array(SourceDescriptorSchema).min(1));

const EnvSchema = z.object({
  DISCORD_WEBHOOK_URL: z
    .string()
    .optional()
    .transform(value => (value && value.trim() !== '' ? value.trim() : undefined))
    .pipe(z.string().url().optional()),
  FORCE_SEND: booleanFlag,
  DRY_RUN: booleanFlag,
  STATE_FILE: z.string().min(1).default('sent_warnings.json'),
  FEED_SOURCES: sourcesJson,
  FEED_USER_AGENT: z.string().min(1).default('Mozilla/5.0 (compatible; HazardRelay/1.0)'),
  FETCH_TIMEOUT_MS: timeoutMs(20_000),
  NOTIFY_TIMEOUT_MS: timeoutMs(15_000),
  MESSAGE_FORMAT: z.enum(['embed', 'plain']).default('embed'),
  REGION_NAME: z.string().min(1).default('QLD'),
  NOTIFY_USERNAME: z.string().min(1).default('BOM Warnings (QLD)'),
  NOTIFY_FOOTER: z.string().min(1).default('Source: Bureau of Meteorology - Queensland'),
  HTML_KEYWORDS: csvList(DEFAULT_KEYWORDS),
  HTML_EXCLUDE: csvList(DEFAULT_EXCLUSIONS),
});

// ============================================================
// CONFIG
// ============================================================

export type MessageFormat = 'embed' | 'plain';

export interface RelayConfig {
  webhookUrl?: string;
  forceSend: boolean;
  dryRun: boolean;
  stateFile: string;
  sources: SourceDescriptor[];
  userAgent: string;
  fetchTimeoutMs: number;
  notifyTimeoutMs: number;
  messageFormat: MessageFormat;
  regionName: string;
  username: string;
  footerText: string;
  keywords: string[];
  exclusions: string[];
}

export interface ConfigOverrides {
  forceSend?: boolean;
  dryRun?: boolean;
}

/**
 * Build the relay configuration from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Readonly<RelayConfig> {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  return Object.freeze({
    webhookUrl: e.DISCORD_WEBHOOK_URL,
    forceSend: overrides.forceSend ?? e.FORCE_SEND,
    dryRun: overrides.dryRun ?? e.DRY_RUN,
    stateFile: e.STATE_FILE,
    sources: e.FEED_SOURCES,
    userAgent: e.FEED_USER_AGENT,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    notifyTimeoutMs: e.NOTIFY_TIMEOUT_MS,
    messageFormat: e.MESSAGE_FORMAT,
    regionName: e.REGION_NAME,
    username: e.NOTIFY_USERNAME,
    footerText: e.NOTIFY_FOOTER,
    keywords: e.HTML_KEYWORDS,
    exclusions: e.HTML_EXCLUDE,
  });
}
