/**
 * Tests for Discord delivery
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DiscordNotifier,
  LONG_HEADLINE_TITLE,
  MAX_BODY_LENGTH,
  MAX_TITLE_LENGTH,
  buildAlertMessage,
  buildTextMessage,
  clearedNotice,
  fetchFailedNotice,
  sendDiscordMessage,
  truncate,
  type MessageStyle,
} from '../../src/delivery/discord';
import { NotifyFailure } from '../../src/lib/errors';
import type { Alert } from '../../src/types';
import { hangUntilAborted } from '../fixtures/fakes';

const WEBHOOK = 'https://discord.example.org/api/webhooks/test';

const embedStyle: MessageStyle = {
  format: 'embed',
  username: 'Test Warnings',
  footerText: 'Source: test feed',
};
const plainStyle: MessageStyle = { ...embedStyle, format: 'plain' };

const warning: Alert = {
  id: 'IDQ21033-1',
  headline: 'Severe Thunderstorm Warning',
  description: 'Damaging winds and large hail.',
  link: 'https://example.org/warn/IDQ21033.html',
};

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

describe('Discord Delivery', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('truncate', () => {
    it('keeps short text and marks cut text with an ellipsis', () => {
      expect(truncate('short', 10)).toBe('short');
      expect(truncate('abcdefghij', 5)).toBe('abcd…');
      expect(truncate('abc', 0)).toBe('');
    });

    it('never splits a surrogate pair', () => {
      expect(truncate('a' + '🌀'.repeat(5), 3)).toBe('a…');
      expect(truncate('a' + '🌀'.repeat(5), 4)).toBe('a🌀…');
    });
  });

  describe('buildAlertMessage', () => {
    it('builds an embed with title, description, link and footer', () => {
      expect(buildAlertMessage(warning, embedStyle)).toEqual({
        username: 'Test Warnings',
        embeds: [
          {
            title: '⚠️ Severe Thunderstorm Warning',
            description: 'Damaging winds and large hail.',
            url: 'https://example.org/warn/IDQ21033.html',
            color: 0xff6600,
            footer: { text: 'Source: test feed' },
          },
        ],
      });
    });

    it('omits empty optional fields from the embed', () => {
      const message = buildAlertMessage({ ...warning, description: null, link: null }, embedStyle);
      expect(message.embeds?.[0]).toEqual({
        title: '⚠️ Severe Thunderstorm Warning',
        color: 0xff6600,
        footer: { text: 'Source: test feed' },
      });
    });

    it('caps the embed description at the body limit', () => {
      const message = buildAlertMessage({ ...warning, description: 'x'.repeat(2500) }, embedStyle);
      const description = message.embeds?.[0]?.description ?? '';

      expect(description).toHaveLength(MAX_BODY_LENGTH);
      expect(description.endsWith('…')).toBe(true);
      expect(message.embeds?.[0]?.title).toBe('⚠️ Severe Thunderstorm Warning');
    });

    it('moves a headline too long for the title into the description', () => {
      const headline = 'W'.repeat(300);
      const embed = buildAlertMessage({ ...warning, headline }, embedStyle).embeds?.[0];

      expect(embed?.title).toBe(LONG_HEADLINE_TITLE);
      expect(embed?.description).toBe(`${headline}\n\nDamaging winds and large hail.`);
      expect(embed?.url).toBe('https://example.org/warn/IDQ21033.html');
    });

    it('keeps a headline that exactly fills the title', () => {
      const headline = 'W'.repeat(MAX_TITLE_LENGTH - 3);
      const embed = buildAlertMessage({ ...warning, headline }, embedStyle).embeds?.[0];

      expect(embed?.title).toHaveLength(MAX_TITLE_LENGTH);
      expect(embed?.description).toBe('Damaging winds and large hail.');
    });

    it('caps a scraped paragraph used as headline within the embed limits', () => {
      const headline = `Severe Weather Warning ${'for damaging winds '.repeat(40)}`.trim();
      const embed = buildAlertMessage({ ...warning, headline, description: null }, embedStyle).embeds?.[0];

      expect(embed?.title).toBe(LONG_HEADLINE_TITLE);
      expect(embed?.description).toBe(headline);
    });

    it('keeps a 300 character headline whole in plain content', () => {
      const headline = 'W'.repeat(300);
      const content = buildAlertMessage({ ...warning, headline }, plainStyle).content;

      expect(content).toBe(
        `⚠️ **${headline}**\nhttps://example.org/warn/IDQ21033.html\nDamaging winds and large hail.`
      );
    });

    it('shortens a headline longer than the body limit in plain content', () => {
      const link = 'https://example.org/warn/IDQ21033.html';
      const content = buildAlertMessage({ ...warning, headline: 'W'.repeat(2500) }, plainStyle).content ?? '';

      expect(content).toHaveLength(MAX_BODY_LENGTH);
      expect(content.startsWith('⚠️ **WWW')).toBe(true);
      expect(content.endsWith(`W…**\n${link}`)).toBe(true);
    });

    it('builds plain content with headline, link and description', () => {
      expect(buildAlertMessage(warning, plainStyle)).toEqual({
        content:
          '⚠️ **Severe Thunderstorm Warning**\n' +
          'https://example.org/warn/IDQ21033.html\n' +
          'Damaging winds and large hail.',
      });
    });

    it('shortens only the description of plain content', () => {
      const head = '⚠️ **Severe Thunderstorm Warning**\nhttps://example.org/warn/IDQ21033.html';
      const content = buildAlertMessage({ ...warning, description: 'y'.repeat(3000) }, plainStyle).content ?? '';

      expect(content).toHaveLength(MAX_BODY_LENGTH);
      expect(content.startsWith(`${head}\ny`)).toBe(true);
      expect(content.endsWith('y…')).toBe(true);
    });
  });

  describe('text notices', () => {
    it('formats the cleared and fetch failure notices', () => {
      expect(clearedNotice('QLD')).toBe('ℹ️ Warnings cleared - No current warnings in QLD.');
      expect(fetchFailedNotice('QLD', 'All feed sources failed')).toBe(
        "❌ Couldn't fetch QLD warnings: All feed sources failed"
      );
    });

    it('sends notices as content, with the username for embed style', () => {
      expect(buildTextMessage('hello', embedStyle)).toEqual({ username: 'Test Warnings', content: 'hello' });
      expect(buildTextMessage('hello', plainStyle)).toEqual({ content: 'hello' });
    });
  });

  describe('sendDiscordMessage', () => {
    it('only logs when no webhook is configured', async () => {
      const result = await sendDiscordMessage({ content: 'hi' }, { timeoutMs: 1000 });

      expect(result.success).toBe(true);
      expect(result.delivered).toBe(false);
      expect(mockFetch).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalled();
    });

    it('posts JSON to the webhook', async () => {
      mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      const result = await sendDiscordMessage({ content: 'hi' }, { webhookUrl: WEBHOOK, timeoutMs: 1000 });

      expect(result).toEqual(expect.objectContaining({ success: true, delivered: true, status: 204 }));
      expect(mockFetch).toHaveBeenCalledWith(
        WEBHOOK,
        expect.objectContaining({
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: '{"content":"hi"}',
        })
      );
    });

    it('reports rejected messages', async () => {
      mockFetch.mockResolvedValueOnce(new Response('{"message":"Invalid Form Body"}', { status: 400 }));

      const result = await sendDiscordMessage({ content: 'hi' }, { webhookUrl: WEBHOOK, timeoutMs: 1000 });

      expect(result.success).toBe(false);
      expect(result.status).toBe(400);
      expect(result.error).toBe('Discord webhook error: 400 - {"message":"Invalid Form Body"}');
    });

    it('reports transport errors', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await sendDiscordMessage({ content: 'hi' }, { webhookUrl: WEBHOOK, timeoutMs: 1000 });

      expect(result.success).toBe(false);
      expect(result.error).toBe('Discord webhook request failed: fetch failed');
    });

    it('gives up on a webhook that does not answer in time', async () => {
      mockFetch.mockImplementationOnce(async (_input, init) => hangUntilAborted(init));

      const result = await sendDiscordMessage({ content: 'hi' }, { webhookUrl: WEBHOOK, timeoutMs: 20 });

      expect(result.success).toBe(false);
      expect(result.delivered).toBe(false);
      expect(result.error).toBe('Discord webhook request timed out after 20ms');
    });
  });

  describe('DiscordNotifier', () => {
    it('posts the alert embed', async () => {
      mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));
      const notifier = new DiscordNotifier({ webhookUrl: WEBHOOK, timeoutMs: 1000 }, embedStyle);

      await notifier.notify(warning);

      const body = mockFetch.mock.calls[0]?.[1]?.body;
      expect(typeof body === 'string' ? JSON.parse(body) : undefined).toEqual(buildAlertMessage(warning, embedStyle));
    });

    it('throws NotifyFailure with the status when the webhook rejects', async () => {
      mockFetch.mockResolvedValueOnce(new Response('rate limited', { status: 429 }));
      const notifier = new DiscordNotifier({ webhookUrl: WEBHOOK, timeoutMs: 1000 }, embedStyle);

      const error = await notifier.notify(warning).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotifyFailure);
      expect(error).toMatchObject({ code: 'NOTIFY_FAILED', status: 429 });
    });

    it('throws NotifyFailure when the webhook times out', async () => {
      mockFetch.mockImplementationOnce(async (_input, init) => hangUntilAborted(init));
      const notifier = new DiscordNotifier({ webhookUrl: WEBHOOK, timeoutMs: 20 }, embedStyle);

      const error = await notifier.notify(warning).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotifyFailure);
      expect(error).toMatchObject({ message: 'Discord webhook request timed out after 20ms' });
    });

    it('does not throw when only logging', async () => {
      const notifier = new DiscordNotifier({ timeoutMs: 1000 }, embedStyle);
      await expect(notifier.notifyText('hello')).resolves.toBeUndefined();
    });
  });
});
