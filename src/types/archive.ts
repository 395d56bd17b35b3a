/**
 * Postwatch — Archive Types
 */

export type ArchiveEventKind = 'item_seen' | 'item_enriched' | 'delivery' | 'dead_letter';

export interface ArchiveEvent {
  kind: ArchiveEventKind;
  itemId: string;
  accountHandle: string;
  recordedAt: string;
  payload: Record<string, unknown>;
}
