/**
 * Postwatch — Post analysis
 *
 * Translation, summary and tagging of post text through the Anthropic
 * Messages API. Analysis is an enrichment: a failure here never stops an
 * item from being delivered.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { AnalysisResult, Item } from '../types';
import { AnalysisResultSchema } from '../types';
import { AnalysisUnavailableError, toErrorMessage } from '../lib/errors';
import { withTimeout } from '../lib/timeout';
import { logger } from '../lib/logger';

// ============================================================
// CONFIGURATION
// ============================================================

const MAX_TOKENS = 1024;

export interface AnalyzerConfig {
  model: string;
  timeoutMs: number;
  maxTokens?: number;
  temperature?: number;
}

// ============================================================
// SERVICE INTERFACE
// ============================================================

export interface AnalysisService {
  readonly enabled: boolean;
  analyze(text: string): Promise<AnalysisResult>;
}

export interface EnrichedItem {
  item: Item;
  analysis: AnalysisResult | null;
  /** Why analysis is missing, when it is */
  analysisUnavailable?: string;
}

/**
 * The slice of the Anthropic client the analyzer calls.
 */
export interface MessagesApi {
  create(
    params: {
      model: string;
      max_tokens: number;
      temperature?: number;
      system?: string;
      messages: Array<{ role: 'user'; content: string }>;
    },
    options?: { signal?: AbortSignal }
  ): Promise<{ content: ReadonlyArray<{ type: string; text?: string }> }>;
}

// ============================================================
// PROMPTS
// ============================================================

function buildSystemPrompt(): string {
  return `You analyze short social media posts for a notification feed.

Respond with a single JSON object and nothing else:
{
  "translation": "the post translated to Simplified Chinese (empty string if already Chinese)",
  "summary": "one-line summary, at most 30 characters",
  "tags": ["up to 5 short topic tags"],
  "category": "finance | crypto | technology | ai | health | politics | personal | other",
  "hints": ["notable points a reader should not miss, may be empty"]
}`;
}

function buildUserPrompt(text: string): string {
  return `Analyze this post:\n\n${text}`;
}

// ============================================================
// RESPONSE PARSING
// ============================================================

/**
 * Parse the model's answer: plain JSON or JSON inside a fenced code block.
 */
export function parseAnalysisResponse(text: string): AnalysisResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    const jsonMatch = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (!jsonMatch?.[1]) {
      throw new Error('Could not parse JSON from response');
    }
    json = JSON.parse(jsonMatch[1]);
  }

  const parsed = AnalysisResultSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
    throw new Error(`Analysis response failed validation: ${fields}`);
  }
  return parsed.data;
}

// ============================================================
// SERVICES
// ============================================================

export class AnthropicAnalysisService implements AnalysisService {
  readonly enabled = true;
  private readonly messages: MessagesApi;
  private readonly config: Required<AnalyzerConfig>;
  private readonly logger = logger.child({ module: 'analysis' });

  constructor(config: AnalyzerConfig & { apiKey?: string; messages?: MessagesApi }) {
    this.config = {
      model: config.model,
      timeoutMs: config.timeoutMs,
      maxTokens: config.maxTokens ?? MAX_TOKENS,
      temperature: config.temperature ?? 0.3,
    };

    if (config.messages) {
      this.messages = config.messages;
    } else if (config.apiKey) {
      this.messages = new Anthropic({ apiKey: config.apiKey }).messages;
    } else {
      throw new Error('AnthropicAnalysisService needs an apiKey or a messages client');
    }
  }

  async analyze(text: string): Promise<AnalysisResult> {
    const startTime = Date.now();

    try {
      const response = await withTimeout('Analysis request', this.config.timeoutMs, signal =>
        this.messages.create(
          {
            model: this.config.model,
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
            system: buildSystemPrompt(),
            messages: [{ role: 'user', content: buildUserPrompt(text) }],
          },
          { signal }
        )
      );

      const textContent = response.content.find(block => block.type === 'text');
      if (!textContent?.text) {
        throw new Error('No text content in response');
      }

      const result = parseAnalysisResponse(textContent.text);
      this.logger.debug('Analysis completed', {
        category: result.category,
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      throw new AnalysisUnavailableError(`Analysis failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Used when no API key is configured.
 */
export class DisabledAnalysisService implements AnalysisService {
  readonly enabled = false;

  async analyze(): Promise<AnalysisResult> {
    throw new AnalysisUnavailableError('Analysis disabled: no API key configured');
  }
}

export function createAnalysisService(config: AnalyzerConfig & { apiKey?: string }): AnalysisService {
  if (!config.apiKey) {
    logger.warn('ANTHROPIC_API_KEY not set, posts are delivered without analysis');
    return new DisabledAnalysisService();
  }
  return new AnthropicAnalysisService(config);
}

// ============================================================
// ENRICHMENT
// ============================================================

/**
 * Text sent for analysis: post text without media or link URLs, followed by
 * the quoted post. Empty when only URLs remain.
 */
export function buildAnalysisText(item: Item): string {
  let cleaned = item.content;
  for (const url of [...item.media.map(m => m.url), ...item.links.map(l => l.url)]) {
    if (url) cleaned = cleaned.split(url).join('');
  }
  cleaned = cleaned.replace(/\s+/g, ' ').trim();

  if (!cleaned) return '';

  let fullText = cleaned;
  if (item.isQuote && item.quoteText) {
    fullText += `\n\nQuoted post:\n${item.quoteText}`;
    if (item.quoteAuthor) {
      fullText += `\nAuthor: ${item.quoteAuthor}`;
    }
  }
  return fullText;
}

/**
 * Attach analysis to an item. Never throws.
 */
export async function enrichItem(service: AnalysisService, item: Item): Promise<EnrichedItem> {
  const text = buildAnalysisText(item);
  if (!text) {
    return { item, analysis: null, analysisUnavailable: 'no text to analyze' };
  }

  try {
    const analysis = await service.analyze(text);
    return { item, analysis };
  } catch (error) {
    const reason = toErrorMessage(error);
    if (service.enabled) {
      logger.warn('Analysis unavailable, delivering raw content', { itemId: item.id, error: reason });
    }
    return { item, analysis: null, analysisUnavailable: reason };
  }
}
