/**
 * Postwatch — Console channel (development fallback)
 */

import type { NotificationPayload } from '../../types';
import type { DeliveryChannel } from './types';
import { logger, type Logger } from '../../lib/logger';

export class ConsoleChannel implements DeliveryChannel {
  readonly kind = 'console' as const;
  readonly name: string;
  private readonly out: Logger;

  constructor(options: { name: string; out?: Logger }) {
    this.name = options.name;
    this.out = options.out ?? logger.child({ channel: options.name });
  }

  async send(payload: NotificationPayload): Promise<void> {
    this.out.info(`Notification: ${payload.title}`, { itemId: payload.itemId, body: payload.body });
  }
}
