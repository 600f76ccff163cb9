/**
 * Hazard Relay: Feeds Module
 */

export { AlertSource, type SourceResult, type TransportOptions } from './base';
export { SourceChain, type ChainResolution } from './chain';
export { normalizeAlert, deriveAlertId, uniqueById, alertIds, type RawAlertFields } from './normalizer';
export {
  createSource,
  createSources,
  RssAlertSource,
  CapAlertSource,
  HtmlAlertSource,
  parseRssAlerts,
  parseCapAlerts,
  parseHtmlAlerts,
  extractWarningTexts,
  type ScrapeRules,
} from './sources';
