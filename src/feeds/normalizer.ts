/**
 * Hazard Relay: Alert Normalizer
 *
 * Turns the loose fields a parser pulled out of a feed into an `Alert`.
 */

import { DEFAULT_HEADLINE, type Alert } from '../types';

export interface RawAlertFields {
  explicitId?: string | null;
  headline?: string | null;
  description?: string | null;
  link?: string | null;
}

function present(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Stable identifier: explicit id, else link, else headline text.
 */
export function deriveAlertId(fields: RawAlertFields): string {
  return (
    present(fields.explicitId) ??
    present(fields.link) ??
    present(fields.headline) ??
    DEFAULT_HEADLINE
  );
}

export function normalizeAlert(fields: RawAlertFields): Alert {
  return {
    id: deriveAlertId(fields),
    headline: present(fields.headline) ?? DEFAULT_HEADLINE,
    description: present(fields.description),
    link: present(fields.link),
  };
}

/**
 * Drop repeated ids, keeping the first occurrence and feed order.
 */
export function uniqueById(alerts: Alert[]): Alert[] {
  const seen = new Set<string>();
  return alerts.filter(alert => {
    if (seen.has(alert.id)) return false;
    seen.add(alert.id);
    return true;
  });
}

export function alertIds(alerts: Alert[]): Set<string> {
  return new Set(alerts.map(a => a.id));
}
