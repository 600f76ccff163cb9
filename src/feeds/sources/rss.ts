/**
 * Hazard Relay: RSS Feed Source
 *
 * RSS 2.0 warning feeds, one alert per <item>.
 */

import type { Alert } from '../../types';
import { ParseFailure } from '../../lib/errors';
import { AlertSource } from '../base';
import { childText, elements, hasElement } from '../markup';
import { normalizeAlert } from '../normalizer';

export function parseRssAlerts(xml: string): Alert[] {
  if (!hasElement(xml, 'rss') && !hasElement(xml, 'channel')) {
    throw new ParseFailure('Not an RSS document: no <rss> or <channel> element');
  }

  return elements(xml, 'item').map(item =>
    normalizeAlert({
      explicitId: childText(item, 'guid'),
      headline: childText(item, 'title'),
      description: childText(item, 'description'),
      link: childText(item, 'link'),
    })
  );
}

export class RssAlertSource extends AlertSource {
  readonly kind = 'rss' as const;
  protected readonly authoritativeByDefault = true;

  protected get accept(): string {
    return 'application/rss+xml,application/xml,text/xml;q=0.9,*/*;q=0.8';
  }

  parse(body: string): Alert[] {
    return parseRssAlerts(body);
  }
}
