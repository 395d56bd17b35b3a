/**
 * Shared test data builders.
 */

import type { Item, NotificationPayload } from '../../src/types';

export const createMockItem = (overrides: Partial<Item> = {}): Item => ({
  id: '123',
  accountHandle: 'alice',
  content: 'Shipping the new release today',
  capturedAt: new Date('2026-01-15T12:00:00.000Z'),
  url: 'https://x.com/alice/status/123',
  authorName: 'Alice',
  postedAtLabel: '2h',
  postedAt: new Date('2026-01-15T10:00:00.000Z'),
  isPinned: false,
  isRetweet: false,
  isQuote: false,
  media: [],
  links: [],
  ...overrides,
});

export const createMockPayload = (overrides: Partial<NotificationPayload> = {}): NotificationPayload => ({
  itemId: '123',
  accountHandle: 'alice',
  title: '【Alice】 Shipping the new release today',
  body: '### 📝 Original\n\nShipping the new release today',
  ...overrides,
});
