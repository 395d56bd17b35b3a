/**
 * Postwatch — Channel HTTP helper
 */

import { DeliveryError, toErrorMessage } from '../../lib/errors';

const MAX_ERROR_BODY = 200;

/**
 * POST a JSON body. Non-2xx responses and transport errors become DeliveryError.
 */
export async function postJson(args: {
  channel: string;
  url: string;
  body: unknown;
  signal: AbortSignal;
  fetchImpl: typeof fetch;
}): Promise<Response> {
  let response: Response;
  try {
    response = await args.fetchImpl(args.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(args.body),
      signal: args.signal,
    });
  } catch (error) {
    throw new DeliveryError({
      channel: args.channel,
      message: `Request failed: ${toErrorMessage(error)}`,
      cause: error,
    });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new DeliveryError({
      channel: args.channel,
      status: response.status,
      message: `HTTP ${response.status}${text ? `: ${text.slice(0, MAX_ERROR_BODY)}` : ''}`,
    });
  }

  return response;
}
