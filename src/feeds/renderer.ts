/**
 * Postwatch — Page rendering backend
 *
 * Mirrors serve their timelines behind JavaScript challenges, so pages are
 * rendered by an external headless-browser service. The fetcher only sees
 * the Renderer interface.
 */

import { z } from 'zod';

export interface RenderedPage {
  html: string;
  /** Post id → file name of that post's screenshot, as stored by the render service */
  screenshots?: ReadonlyMap<string, string>;
}

export interface Renderer {
  render(url: string, signal: AbortSignal): Promise<RenderedPage>;
}

const RenderResponseSchema = z.object({
  html: z.string(),
  screenshots: z.record(z.string().min(1)).optional(),
});

export interface HttpRendererOptions {
  baseUrl: string;
  waitForSelector?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Client for a render service exposing `POST /render {url, waitForSelector}`
 * and answering `{html, screenshots?: {[postId]: fileName}}`.
 */
export class HttpRenderer implements Renderer {
  private readonly endpoint: string;
  private readonly waitForSelector: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRendererOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/render`;
    this.waitForSelector = options.waitForSelector ?? '.timeline-item';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async render(url: string, signal: AbortSignal): Promise<RenderedPage> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ url, waitForSelector: this.waitForSelector }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Render service returned ${response.status}`);
    }

    const parsed = RenderResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Render service returned an invalid payload');
    }

    const { html, screenshots } = parsed.data;
    return screenshots ? { html, screenshots: new Map(Object.entries(screenshots)) } : { html };
  }
}
