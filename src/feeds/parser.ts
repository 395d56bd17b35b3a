/**
 * Postwatch — Timeline parser
 *
 * Extracts posts from a mirror's rendered timeline page.
 */

import * as cheerio from 'cheerio';
import type { Item, MediaAttachment, PostLink } from '../types';

export const CANONICAL_POST_ORIGIN = 'https://x.com';

export interface ParseTimelineOptions {
  handle: string;
  /** Maximum number of posts to return */
  limit: number;
  /** Endpoint the page came from; relative media URLs resolve against it */
  baseUrl: string;
  now?: Date;
  /** Per-post screenshot file names keyed by post id */
  screenshots?: ReadonlyMap<string, string>;
}

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const RELATIVE_UNITS_MS: Record<string, number> = {
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

function monthIndex(name: string): number | null {
  const index = MONTHS[name.slice(0, 3).toLowerCase()];
  return index === undefined ? null : index;
}

function to24Hour(hour: number, meridiem: string | undefined): number {
  if (!meridiem) return hour;
  const pm = meridiem.toUpperCase() === 'PM';
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

function utcDate(year: number, month: number, day: number, hour = 0, minute = 0): Date | null {
  const date = new Date(Date.UTC(year, month, day, hour, minute));
  // Reject rollovers such as "Feb 31"
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) return null;
  return date;
}

/**
 * Parse a mirror time label. Relative labels ("30s", "5m", "2h", "3d") count
 * back from `now`; absolute labels are read as UTC. Returns null when the
 * label matches no known format.
 */
export function parsePostedAt(label: string, now: Date = new Date()): Date | null {
  const text = label.replace(/\s+/g, ' ').trim();
  if (!text) return null;

  const relative = /^(\d+)\s?([smhd])$/i.exec(text);
  if (relative?.[1] && relative[2]) {
    const unitMs = RELATIVE_UNITS_MS[relative[2].toLowerCase()];
    if (unitMs === undefined) return null;
    return new Date(now.getTime() - Number(relative[1]) * unitMs);
  }

  // Jan 23, 2024 · 10:30 AM UTC  /  Jan 23, 2024 · 22:30 UTC  /  Jan 23, 2024
  const monthFirst =
    /^([A-Za-z]{3,9}) (\d{1,2}), (\d{4})(?: · (\d{1,2}):(\d{2})(?: ?([AP]M))?(?: UTC)?)?$/i.exec(text);
  if (monthFirst?.[1] && monthFirst[2] && monthFirst[3]) {
    const month = monthIndex(monthFirst[1]);
    if (month === null) return null;
    const hour = monthFirst[4] ? to24Hour(Number(monthFirst[4]), monthFirst[6]) : 0;
    const minute = monthFirst[5] ? Number(monthFirst[5]) : 0;
    return utcDate(Number(monthFirst[3]), month, Number(monthFirst[2]), hour, minute);
  }

  // 25 Dec 2024  /  25 Dec 2024 · 15:30  /  25 Dec 2024 · 3:30 PM
  const dayFirst =
    /^(\d{1,2}) ([A-Za-z]{3,9}) (\d{4})(?: · (\d{1,2}):(\d{2})(?: ?([AP]M))?(?: UTC)?)?$/i.exec(text);
  if (dayFirst?.[1] && dayFirst[2] && dayFirst[3]) {
    const month = monthIndex(dayFirst[2]);
    if (month === null) return null;
    const hour = dayFirst[4] ? to24Hour(Number(dayFirst[4]), dayFirst[6]) : 0;
    const minute = dayFirst[5] ? Number(dayFirst[5]) : 0;
    return utcDate(Number(dayFirst[3]), month, Number(dayFirst[1]), hour, minute);
  }

  // Jan 23 (current year, or last year when that would be in the future)
  const monthDay = /^([A-Za-z]{3,9}) (\d{1,2})$/.exec(text);
  if (monthDay?.[1] && monthDay[2]) {
    const month = monthIndex(monthDay[1]);
    if (month === null) return null;
    const day = Number(monthDay[2]);
    const thisYear = utcDate(now.getUTCFullYear(), month, day);
    if (thisYear && thisYear.getTime() <= now.getTime()) return thisYear;
    return utcDate(now.getUTCFullYear() - 1, month, day);
  }

  return null;
}

/**
 * Post id from a status link: last path segment without fragment or query.
 */
export function extractPostId(href: string): string {
  const withoutSuffix = href.split('#')[0]?.split('?')[0] ?? '';
  const segments = withoutSuffix.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? '';
}

function canonicalPostUrl(href: string): string {
  const pathPart = href.split('#')[0]?.split('?')[0] ?? '';
  try {
    // Absolute links keep only their path
    const { pathname } = new URL(pathPart, CANONICAL_POST_ORIGIN);
    return `${CANONICAL_POST_ORIGIN}${pathname}`;
  } catch {
    return `${CANONICAL_POST_ORIGIN}/${pathPart.replace(/^\/+/, '')}`;
  }
}

function resolveUrl(src: string, baseUrl: string): string | null {
  try {
    return new URL(src, `${baseUrl.replace(/\/+$/, '')}/`).toString();
  } catch {
    return null;
  }
}

function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Parse up to `limit` posts, newest first as the mirror lists them.
 * Entries without a resolvable id are skipped.
 */
export function parseTimeline(html: string, options: ParseTimelineOptions): Item[] {
  const $ = cheerio.load(html);
  const now = options.now ?? new Date();
  const items: Item[] = [];

  $('.timeline-item').each((_, element) => {
    if (items.length >= options.limit) return false;

    const $item = $(element);
    const href = $item.find('.tweet-link').first().attr('href') ?? '';
    const id = extractPostId(href);
    if (!id) return;

    const $content = $item.find('.tweet-content').first();
    const $date = $item.find('.tweet-date').first();
    const postedAtLabel = cleanText($date.text());
    const dateTitle = $date.find('a').attr('title') ?? $date.attr('title');

    const $quote = $item.find('.quote').first();
    const isQuote = $quote.length > 0;
    const isRetweet = $item.find('.retweet-header').length > 0;

    const media: MediaAttachment[] = [];
    const pushMedia = (type: MediaAttachment['type'], src: string | undefined): void => {
      const url = src ? resolveUrl(src, options.baseUrl) : null;
      if (url && !media.some(existing => existing.url === url)) media.push({ type, url });
    };
    $item.find('.attachments img, img.tweet-media').each((_, el) => {
      pushMedia('image', $(el).attr('src'));
    });
    $item.find('.attachments video').each((_, el) => {
      const $video = $(el);
      const type = $video.closest('.gallery-gif, .gif').length > 0 ? 'gif' : 'video';
      pushMedia(type, $video.attr('src') ?? $video.find('source').attr('src') ?? $video.attr('poster'));
    });

    const links: PostLink[] = [];
    $content.find('a[href]').each((_, el) => {
      const $link = $(el);
      const url = $link.attr('href') ?? '';
      // Hashtags and mentions are mirror-relative
      if (!/^https?:\/\//i.test(url)) return;
      links.push({ url, title: cleanText($link.text()) || url });
    });

    const authorName = cleanText(
      $item
        .find('.fullname')
        .filter((_, el) => $(el).closest('.quote').length === 0)
        .first()
        .text()
    );
    const retweetAuthor = isRetweet
      ? cleanText($item.find('.retweet-author').first().text()) || authorName || undefined
      : undefined;

    items.push({
      id,
      accountHandle: options.handle,
      content: cleanText($content.text()),
      capturedAt: now,
      screenshotRef: options.screenshots?.get(id),
      url: canonicalPostUrl(href),
      authorName,
      postedAtLabel,
      postedAt: parsePostedAt(dateTitle ?? postedAtLabel, now) ?? parsePostedAt(postedAtLabel, now),
      isPinned: $item.find('.pinned').length > 0,
      isRetweet,
      retweetAuthor,
      isQuote,
      quoteText: isQuote ? cleanText($quote.find('.quote-text').first().text()) || undefined : undefined,
      quoteAuthor: isQuote ? cleanText($quote.find('.fullname').first().text()) || undefined : undefined,
      media,
      links,
    });
    return;
  });

  return items;
}
