/**
 * Hazard Relay: Delivery
 */

export {
  DiscordNotifier,
  sendDiscordMessage,
  buildAlertMessage,
  buildTextMessage,
  clearedNotice,
  fetchFailedNotice,
  truncate,
  MAX_BODY_LENGTH,
  EMBED_COLOR,
  type Notifier,
  type DiscordMessage,
  type DiscordEmbed,
  type DiscordConfig,
  type DiscordResult,
  type MessageStyle,
} from './discord';
