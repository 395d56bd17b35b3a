/**
 * Postwatch — Delivery channel contract
 */

import type { ChannelKind, NotificationPayload } from '../../types';

export interface DeliveryChannel {
  readonly name: string;
  readonly kind: ChannelKind;
  /** Resolves on delivery; rejects with DeliveryError otherwise. */
  send(payload: NotificationPayload, signal: AbortSignal): Promise<void>;
}
