/**
 * Postwatch — Delivery Types
 */

export type ChannelKind = 'serverchan' | 'pushdeer' | 'slack' | 'console';

/**
 * Rendered notification, identical for every channel.
 */
export interface NotificationPayload {
  itemId: string;
  accountHandle: string;
  title: string;
  /** Markdown body */
  body: string;
}

export type PushTaskState = 'pending' | 'in_flight' | 'delivered' | 'failed';

export interface PushTask {
  id: string;
  payload: NotificationPayload;
  channel: string;
  attempt: number;
  nextAttemptAt: number;
  state: PushTaskState;
  createdAt: number;
  lastError?: string;
}

export interface DeliveryOutcome {
  taskId: string;
  itemId: string;
  channel: string;
  state: Extract<PushTaskState, 'delivered' | 'failed'>;
  attempts: number;
  error?: string;
  settledAt: string;
}

export interface DeliveryQueueStats {
  pending: number;
  inFlight: number;
  delivered: number;
  failed: number;
}
