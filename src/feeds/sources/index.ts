/**
 * Hazard Relay: Feed Sources Index
 *
 * Builds source instances from configured descriptors.
 */

import type { SourceDescriptor } from '../../types';
import type { RelayConfig } from '../../lib/config';
import type { AlertSource } from '../base';
import { CapAlertSource } from './cap';
import { HtmlAlertSource } from './html';
import { RssAlertSource } from './rss';

export function createSource(
  descriptor: SourceDescriptor,
  config: Pick<RelayConfig, 'userAgent' | 'fetchTimeoutMs' | 'keywords' | 'exclusions'>
): AlertSource {
  const transport = { userAgent: config.userAgent, timeoutMs: config.fetchTimeoutMs };

  switch (descriptor.kind) {
    case 'rss':
      return new RssAlertSource(descriptor, transport);
    case 'cap':
      return new CapAlertSource(descriptor, transport);
    case 'html':
      return new HtmlAlertSource(descriptor, transport, {
        keywords: config.keywords,
        exclusions: config.exclusions,
      });
  }
}

export function createSources(config: RelayConfig): AlertSource[] {
  return config.sources.map(descriptor => createSource(descriptor, config));
}

export { RssAlertSource, parseRssAlerts } from './rss';
export { CapAlertSource, parseCapAlerts } from './cap';
export {
  HtmlAlertSource,
  parseHtmlAlerts,
  extractWarningBlocks,
  extractWarningTexts,
  type ScrapeRules,
  type WarningBlock,
} from './html';
