/**
 * Hazard Relay: Alert Types
 *
 * Every feed format is normalized to `Alert` before deduplication.
 */

import { z } from 'zod';

// ============================================================
// ALERT
// ============================================================

export const DEFAULT_HEADLINE = 'Weather Warning';

export const AlertSchema = z.object({
  id: z.string().min(1),
  headline: z.string().min(1),
  description: z.string().min(1).nullable(),
  link: z.string().min(1).nullable(),
});
export type Alert = z.infer<typeof AlertSchema>;

// ============================================================
// SOURCES
// ============================================================

export const FeedKindSchema = z.enum(['rss', 'cap', 'html']);
export type FeedKind = z.infer<typeof FeedKindSchema>;

export const SourceDescriptorSchema = z.object({
  kind: FeedKindSchema,
  url: z.string().url(),
  priority: z.number().int(),
  name: z.string().min(1).optional(),
  category: z.string().min(1).default('warnings'),
  // An empty list from this feed means "no alerts", not "scrape found nothing".
  authoritativeOnEmpty: z.boolean().optional(),
});
export type SourceDescriptor = z.infer<typeof SourceDescriptorSchema>;

// ============================================================
// SENT STATE
// ============================================================

export interface SentState {
  ids: ReadonlySet<string>;
  /** Sentinel: the "no current alerts" notice went out already. */
  clearedAnnounced: boolean;
  /** Category of the feed that produced this state; null for legacy records. */
  category: string | null;
}

export const EMPTY_SENT_STATE: SentState = Object.freeze({
  ids: new Set<string>(),
  clearedAnnounced: false,
  category: null,
});

export function isFirstRun(state: SentState): boolean {
  return state.ids.size === 0 && !state.clearedAnnounced;
}
