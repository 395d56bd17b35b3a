/**
 * Postwatch — ServerChan channel
 */

import type { NotificationPayload } from '../../types';
import type { DeliveryChannel } from './types';
import { postJson } from './http';
import { DeliveryError } from '../../lib/errors';
import { logger, maskSecret } from '../../lib/logger';

export interface ServerChanOptions {
  name: string;
  key: string;
  /** URL with a `{key}` placeholder */
  urlTemplate: string;
  /** Pipe-separated tags, e.g. "twitter|monitor" */
  tags?: string;
  fetchImpl?: typeof fetch;
}

export class ServerChanChannel implements DeliveryChannel {
  readonly kind = 'serverchan' as const;
  readonly name: string;
  private readonly url: string;
  private readonly key: string;
  private readonly tags?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ServerChanOptions) {
    this.name = options.name;
    this.key = options.key;
    this.url = options.urlTemplate.split('{key}').join(encodeURIComponent(options.key));
    this.tags = options.tags;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(payload: NotificationPayload, signal: AbortSignal): Promise<void> {
    const response = await postJson({
      channel: this.name,
      url: this.url,
      body: { title: payload.title, desp: payload.body, ...(this.tags ? { tags: this.tags } : {}) },
      signal,
      fetchImpl: this.fetchImpl,
    });

    // ServerChan answers 200 with a non-zero code on rejected keys
    const result: unknown = await response.json().catch(() => null);
    if (result && typeof result === 'object' && 'code' in result && result.code !== 0) {
      const message = 'message' in result ? String(result.message) : 'unknown error';
      throw new DeliveryError({ channel: this.name, message: `ServerChan error ${String(result.code)}: ${message}` });
    }

    logger.info('ServerChan push delivered', { channel: this.name, key: maskSecret(this.key) });
  }
}
