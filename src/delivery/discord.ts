/**
 * Hazard Relay: Discord Delivery
 *
 * Posts alerts to a Discord webhook, either as an embed or as plain content.
 * Bodies are capped at MAX_BODY_LENGTH characters and embed titles at
 * MAX_TITLE_LENGTH. A headline too long for a title moves into the description.
 */

import type { Alert } from '../types';
import type { MessageFormat, RelayConfig } from '../lib/config';
import { NotifyFailure } from '../lib/errors';
import { fetchWithTimeout, isAbortError } from '../lib/http';
import { errorMessage, logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export const MAX_BODY_LENGTH = 2000;
export const MAX_TITLE_LENGTH = 256;
export const EMBED_COLOR = 0xff6600;
/** Embed title for alerts whose headline does not fit in a title. */
export const LONG_HEADLINE_TITLE = '⚠️ New Warning';
const ELLIPSIS = '…';

export interface DiscordEmbed {
  title: string;
  description?: string;
  url?: string;
  color: number;
  footer: { text: string };
}

export interface DiscordMessage {
  username?: string;
  content?: string;
  embeds?: DiscordEmbed[];
}

export interface DiscordConfig {
  webhookUrl?: string;
  timeoutMs: number;
}

export interface DiscordResult {
  success: boolean;
  /** False when no webhook is configured and the message was only logged. */
  delivered: boolean;
  status?: number;
  error?: string;
  sentAt: string;
}

export interface MessageStyle {
  format: MessageFormat;
  username: string;
  footerText: string;
}

export interface Notifier {
  notify(alert: Alert): Promise<void>;
  notifyText(text: string): Promise<void>;
}

// ============================================================
// MESSAGE BUILDERS
// ============================================================

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut to at most `max` UTF-16 units, ellipsis included, without splitting a surrogate pair.
 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  if (max <= 0) return '';
  let end = max - 1;
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) end--;
  return text.slice(0, end) + ELLIPSIS;
}

function plainAlertContent(alert: Alert): string {
  const linkLength = alert.link ? alert.link.length + 1 : 0;
  // ⚠️ **…** adds 7 units around the headline
  const headline = truncate(alert.headline, MAX_BODY_LENGTH - 7 - linkLength);
  const lines = [`⚠️ **${headline}**`];
  if (alert.link) lines.push(alert.link);

  if (alert.description) {
    const head = lines.join('\n');
    // +1 for the newline before the description
    const budget = MAX_BODY_LENGTH - head.length - 1;
    const description = truncate(alert.description, budget);
    if (description) lines.push(description);
  }

  return lines.join('\n');
}

export function buildAlertMessage(alert: Alert, style: MessageStyle): DiscordMessage {
  if (style.format === 'plain') {
    return { content: plainAlertContent(alert) };
  }

  const title = `⚠️ ${alert.headline}`;
  const fitsTitle = title.length <= MAX_TITLE_LENGTH;
  const description = fitsTitle
    ? alert.description
    : [alert.headline, alert.description].filter(Boolean).join('\n\n');

  const embed: DiscordEmbed = {
    title: fitsTitle ? title : LONG_HEADLINE_TITLE,
    color: EMBED_COLOR,
    footer: { text: style.footerText },
  };
  if (description) embed.description = truncate(description, MAX_BODY_LENGTH);
  if (alert.link) embed.url = alert.link;

  return { username: style.username, embeds: [embed] };
}

export function buildTextMessage(text: string, style: MessageStyle): DiscordMessage {
  const content = truncate(text, MAX_BODY_LENGTH);
  return style.format === 'plain' ? { content } : { username: style.username, content };
}

export function clearedNotice(regionName: string): string {
  return `ℹ️ Warnings cleared - No current warnings in ${regionName}.`;
}

export function fetchFailedNotice(regionName: string, reason: string): string {
  return `❌ Couldn't fetch ${regionName} warnings: ${reason}`;
}

// ============================================================
// SEND
// ============================================================

/**
 * Post a message to the webhook. Never throws; failures come back in the result.
 */
export async function sendDiscordMessage(
  message: DiscordMessage,
  config: DiscordConfig
): Promise<DiscordResult> {
  if (!config.webhookUrl) {
    logger.warn('DISCORD_WEBHOOK_URL not set, message not sent', { message });
    return { success: true, delivered: false, sentAt: new Date().toISOString() };
  }

  try {
    const res = await fetchWithTimeout(
      config.webhookUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(message),
      },
      config.timeoutMs
    );

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      return {
        success: false,
        delivered: false,
        status: res.status,
        error: `Discord webhook error: ${res.status}${body ? ` - ${body}` : ''}`,
        sentAt: new Date().toISOString(),
      };
    }

    return { success: true, delivered: true, status: res.status, sentAt: new Date().toISOString() };
  } catch (error) {
    return {
      success: false,
      delivered: false,
      error: isAbortError(error)
        ? `Discord webhook request timed out after ${config.timeoutMs}ms`
        : `Discord webhook request failed: ${errorMessage(error)}`,
      sentAt: new Date().toISOString(),
    };
  }
}

// ============================================================
// NOTIFIER
// ============================================================

export class DiscordNotifier implements Notifier {
  private readonly logger = logger.child({ component: 'discord' });

  constructor(
    private readonly config: DiscordConfig,
    private readonly style: MessageStyle
  ) {}

  static fromConfig(config: RelayConfig): DiscordNotifier {
    return new DiscordNotifier(
      { webhookUrl: config.webhookUrl, timeoutMs: config.notifyTimeoutMs },
      { format: config.messageFormat, username: config.username, footerText: config.footerText }
    );
  }

  async notify(alert: Alert): Promise<void> {
    await this.send(buildAlertMessage(alert, this.style), { alertId: alert.id });
  }

  async notifyText(text: string): Promise<void> {
    await this.send(buildTextMessage(text, this.style), { notice: true });
  }

  private async send(message: DiscordMessage, context: Record<string, unknown>): Promise<void> {
    const result = await sendDiscordMessage(message, this.config);

    if (!result.success) {
      this.logger.error('Discord send failed', { ...context, error: result.error });
      throw new NotifyFailure(result.error ?? 'Discord webhook rejected the message', result.status);
    }

    this.logger.info(result.delivered ? 'Discord message sent' : 'Discord message logged only', context);
  }
}
