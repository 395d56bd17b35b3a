/**
 * Postwatch — Channel factory
 */

import type { ChannelConfig } from '../../lib/config';
import type { DeliveryChannel } from './types';
import { ServerChanChannel } from './serverchan';
import { PushDeerChannel } from './pushdeer';
import { SlackChannel } from './slack';
import { ConsoleChannel } from './console';

export type { DeliveryChannel } from './types';
export { ServerChanChannel } from './serverchan';
export { PushDeerChannel } from './pushdeer';
export { SlackChannel, buildSlackMessage, toSlackMrkdwn } from './slack';
export { ConsoleChannel } from './console';

export function createChannel(config: ChannelConfig, fetchImpl?: typeof fetch): DeliveryChannel {
  switch (config.kind) {
    case 'serverchan':
      return new ServerChanChannel({ ...config, fetchImpl });
    case 'pushdeer':
      return new PushDeerChannel({ ...config, fetchImpl });
    case 'slack':
      return new SlackChannel({ ...config, fetchImpl });
    case 'console':
      return new ConsoleChannel({ name: config.name });
  }
}

export function createChannels(configs: readonly ChannelConfig[], fetchImpl?: typeof fetch): DeliveryChannel[] {
  return configs.map(config => createChannel(config, fetchImpl));
}
