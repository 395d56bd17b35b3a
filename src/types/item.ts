/**
 * Postwatch — Item Types
 *
 * Tracked accounts and the posts fetched for them.
 */

import { z } from 'zod';

// ============================================================
// TRACKED ACCOUNT
// ============================================================

export const TrackedAccountSchema = z.object({
  alias: z.string().min(1),
  handle: z.string().min(1).regex(/^[A-Za-z0-9_]+$/, 'handle must be alphanumeric or underscore'),
});
export type TrackedAccount = z.infer<typeof TrackedAccountSchema>;

// ============================================================
// ITEM
// ============================================================

export type MediaType = 'image' | 'video' | 'gif';

export interface MediaAttachment {
  type: MediaType;
  url: string;
}

export interface PostLink {
  url: string;
  title: string;
}

/**
 * A post fetched from a mirror. Transient: not retained after delivery.
 */
export interface Item {
  id: string;
  accountHandle: string;
  content: string;
  capturedAt: Date;
  screenshotRef?: string;

  url: string;
  authorName: string;
  /** Raw time label as shown by the mirror ("2h", "Jan 23, 2024 · 10:30 AM UTC") */
  postedAtLabel: string;
  postedAt: Date | null;

  isPinned: boolean;
  isRetweet: boolean;
  retweetAuthor?: string;
  isQuote: boolean;
  quoteText?: string;
  quoteAuthor?: string;

  media: MediaAttachment[];
  links: PostLink[];
}
