/**
 * Postwatch — Notification rendering
 *
 * Turns an enriched item into the title and markdown body every channel
 * sends.
 */

import type { AnalysisCategory, NotificationPayload } from '../types';
import type { EnrichedItem } from '../analysis/analyzer';

export interface NotificationOptions {
  /** Public base URL of the status server, for screenshot links */
  imageBaseUrl: string;
  /** Display name of the tracked account; defaults to the handle */
  alias?: string;
}

const CATEGORY_MARKERS: Partial<Record<AnalysisCategory, string>> = {
  finance: '💰',
  crypto: '🚀',
  ai: '🤖',
  health: '💊',
  politics: '🀄',
};

const TITLE_FALLBACK_LENGTH = 50;

function titleSummary({ item, analysis }: EnrichedItem): string {
  if (analysis?.summary) return analysis.summary;

  const text = item.content.trim();
  if (!text) return '[media only]';
  return text.length > TITLE_FALLBACK_LENGTH ? `${text.slice(0, TITLE_FALLBACK_LENGTH)}...` : text;
}

export function buildTitle(enriched: EnrichedItem, alias: string): string {
  const parts: string[] = [];
  const marker = enriched.analysis ? CATEGORY_MARKERS[enriched.analysis.category] : undefined;
  if (marker) parts.push(marker);

  if (enriched.item.isRetweet) {
    parts.push('🔄 [Retweet]');
  } else if (enriched.item.isQuote) {
    parts.push('💬 [Quote]');
  }

  parts.push(`【${alias}】`);
  parts.push(titleSummary(enriched));
  return parts.join(' ');
}

function analysisSection({ analysis, analysisUnavailable }: EnrichedItem): string {
  if (!analysis) {
    const reason = analysisUnavailable ? ` (${analysisUnavailable})` : '';
    return `### 📊 Analysis\n\n_Analysis unavailable${reason}_\n`;
  }

  const lines = [`### 📊 Analysis`, ''];
  if (analysis.translation) lines.push(`**Translation**: ${analysis.translation}`, '');
  lines.push(`**Summary**: ${analysis.summary}`, '');
  if (analysis.tags.length > 0) {
    lines.push(`**Tags**: ${analysis.tags.map(tag => `#${tag.replace(/\s+/g, '_')}`).join(' ')}`, '');
  }
  if (analysis.hints.length > 0) {
    lines.push('**Notes**:', ...analysis.hints.map(hint => `- ${hint}`), '');
  }
  return lines.join('\n');
}

function referenceSection({ item }: EnrichedItem): string {
  if (item.isRetweet && item.retweetAuthor) {
    return `\n### 🔄 Retweeted from\n\n**${item.retweetAuthor}**\n`;
  }
  if (item.isQuote && item.quoteText) {
    return `\n### 💬 Quoted post\n\n**${item.quoteAuthor ?? 'unknown'}**:\n${item.quoteText}\n`;
  }
  return '';
}

function mediaSection({ item }: EnrichedItem): string {
  if (item.media.length === 0) return '';

  const lines = item.media.map(media => {
    switch (media.type) {
      case 'image':
        return `![image](${media.url})`;
      case 'video':
        return `🎬 [video](${media.url})`;
      case 'gif':
        return `🎞️ [GIF](${media.url})`;
    }
  });
  return `\n### 📷 Media\n\n${lines.join('\n')}\n`;
}

export function buildNotification(
  enriched: EnrichedItem,
  options: NotificationOptions
): NotificationPayload {
  const { item } = enriched;
  const alias = options.alias ?? item.accountHandle;
  const screenshotFile = item.screenshotRef ?? `${item.id}.png`;
  const imageUrl = `${options.imageBaseUrl.replace(/\/+$/, '')}/images/${encodeURIComponent(screenshotFile)}`;

  const body = [
    analysisSection(enriched),
    `### ℹ️ Details\n`,
    `- **Posted**: ${item.postedAtLabel || 'unknown'}`,
    `- **Posted at**: ${item.postedAt ? item.postedAt.toISOString() : '-'}`,
    `- **Link**: [open](${item.url})`,
    `- **ID**: \`${item.id}\``,
    referenceSection(enriched),
    `\n### 📝 Original\n\n${item.content || '(no text)'}\n`,
    mediaSection(enriched),
    `\n### 📸 Screenshot\n\n![screenshot](${imageUrl})\n`,
  ]
    .filter(section => section !== '')
    .join('\n');

  return {
    itemId: item.id,
    accountHandle: item.accountHandle,
    title: buildTitle(enriched, alias),
    body,
  };
}
