/**
 * Postwatch — Slack incoming-webhook channel
 */

import type { NotificationPayload } from '../../types';
import type { DeliveryChannel } from './types';
import { postJson } from './http';
import { logger } from '../../lib/logger';

// Slack caps header text at 150 chars and section text at 3000
const HEADER_LIMIT = 150;
const SECTION_LIMIT = 3000;

export interface SlackText {
  type: 'plain_text' | 'mrkdwn';
  text: string;
  emoji?: boolean;
}

export interface SlackBlock {
  type: string;
  text?: SlackText;
}

export interface SlackMessage {
  text: string;
  blocks: SlackBlock[];
  unfurl_links?: boolean;
}

/**
 * Split into chunks of at most `limit` UTF-16 units, cutting only between
 * code points so emoji survive intact.
 */
export function chunkText(text: string, limit: number): string[] {
  const chunks: string[] = [];
  let current = '';
  for (const char of text) {
    if (current.length + char.length > limit) {
      chunks.push(current);
      current = '';
    }
    current += char;
  }
  if (current) chunks.push(current);
  return chunks;
}

function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const [head = ''] = chunkText(text, limit - 1);
  return `${head}…`;
}

/**
 * Slack mrkdwn uses *bold* and <url|label> links.
 */
export function toSlackMrkdwn(markdown: string): string {
  return markdown
    .replace(/^#{1,6}\s+(.+)$/gm, '*$1*')
    .replace(/\*\*(.+?)\*\*/g, '*$1*')
    .replace(/!?\[([^\]]*)\]\(([^)\s]+)\)/g, '<$2|$1>');
}

export function buildSlackMessage(payload: NotificationPayload): SlackMessage {
  const body = toSlackMrkdwn(payload.body);
  const sections: SlackBlock[] = chunkText(body, SECTION_LIMIT).map(text => ({
    type: 'section',
    text: { type: 'mrkdwn', text },
  }));

  return {
    text: payload.title,
    blocks: [
      { type: 'header', text: { type: 'plain_text', text: truncate(payload.title, HEADER_LIMIT), emoji: true } },
      ...sections,
    ],
    unfurl_links: false,
  };
}

export class SlackChannel implements DeliveryChannel {
  readonly kind = 'slack' as const;
  readonly name: string;
  private readonly webhookUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: { name: string; webhookUrl: string; fetchImpl?: typeof fetch }) {
    this.name = options.name;
    this.webhookUrl = options.webhookUrl;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(payload: NotificationPayload, signal: AbortSignal): Promise<void> {
    await postJson({
      channel: this.name,
      url: this.webhookUrl,
      body: buildSlackMessage(payload),
      signal,
      fetchImpl: this.fetchImpl,
    });

    logger.info('Slack message sent', { channel: this.name, itemId: payload.itemId });
  }
}
