/**
 * Hazard Relay: CAP Feed Source
 *
 * Common Alerting Protocol documents. Accepts bare <alert> messages (one or
 * many in a wrapper) and Atom feeds whose entries carry CAP fields. Element
 * names are matched without regard to namespace prefix.
 */

import type { Alert } from '../../types';
import { ParseFailure } from '../../lib/errors';
import { AlertSource } from '../base';
import { attributeOf, childText, elements, hasElement } from '../markup';
import { normalizeAlert } from '../normalizer';

function fromCapMessage(alert: string): Alert {
  // Only the first <info> block; later ones are translations.
  const [info = alert] = elements(alert, 'info');
  return normalizeAlert({
    explicitId: childText(alert, 'identifier'),
    headline: childText(info, 'headline') ?? childText(info, 'event'),
    description: childText(info, 'description'),
    link: childText(info, 'web'),
  });
}

function fromAtomEntry(entry: string): Alert {
  return normalizeAlert({
    explicitId: childText(entry, 'id'),
    headline: childText(entry, 'title') ?? childText(entry, 'event'),
    description: childText(entry, 'summary') ?? childText(entry, 'description'),
    link: attributeOf(entry, 'link', 'href') ?? childText(entry, 'link'),
  });
}

export function parseCapAlerts(xml: string): Alert[] {
  const messages = elements(xml, 'alert');
  if (messages.length > 0) {
    return messages.map(fromCapMessage);
  }

  if (hasElement(xml, 'feed')) {
    return elements(xml, 'entry').map(fromAtomEntry);
  }

  throw new ParseFailure('Not a CAP document: no <alert> or <feed> element');
}

export class CapAlertSource extends AlertSource {
  readonly kind = 'cap' as const;
  protected readonly authoritativeByDefault = true;

  protected get accept(): string {
    return 'application/cap+xml,application/atom+xml,application/xml,text/xml;q=0.9,*/*;q=0.8';
  }

  parse(body: string): Alert[] {
    return parseCapAlerts(body);
  }
}
