/**
 * Postwatch — PushDeer channel
 */

import type { NotificationPayload } from '../../types';
import type { DeliveryChannel } from './types';
import { postJson } from './http';
import { logger, maskSecret } from '../../lib/logger';

export class PushDeerChannel implements DeliveryChannel {
  readonly kind = 'pushdeer' as const;
  readonly name: string;
  private readonly key: string;
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: { name: string; key: string; url: string; fetchImpl?: typeof fetch }) {
    this.name = options.name;
    this.key = options.key;
    this.url = options.url;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(payload: NotificationPayload, signal: AbortSignal): Promise<void> {
    await postJson({
      channel: this.name,
      url: this.url,
      body: { pushkey: this.key, text: payload.title, desp: payload.body, type: 'markdown' },
      signal,
      fetchImpl: this.fetchImpl,
    });

    logger.info('PushDeer push delivered', { channel: this.name, key: maskSecret(this.key) });
  }
}
