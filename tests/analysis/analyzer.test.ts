/**
 * Tests for post analysis
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import {
  AnthropicAnalysisService,
  DisabledAnalysisService,
  buildAnalysisText,
  createAnalysisService,
  enrichItem,
  parseAnalysisResponse,
  type AnalysisService,
  type MessagesApi,
} from '../../src/analysis/analyzer';
import { AnalysisUnavailableError } from '../../src/lib/errors';
import { createMockItem } from '../helpers/fixtures';

const VALID_RESPONSE = {
  translation: '今天发布新版本',
  summary: 'New release shipped',
  tags: ['release'],
  category: 'technology',
  hints: [],
};

const createMockMessages = (): MessagesApi & { create: Mock<MessagesApi['create']> } => ({
  create: vi.fn<MessagesApi['create']>(),
});

const textReply = (text: string) => ({ content: [{ type: 'text', text }] });

// ============================================================
// RESPONSE PARSING
// ============================================================

describe('parseAnalysisResponse', () => {
  it('should parse plain JSON', () => {
    expect(parseAnalysisResponse(JSON.stringify(VALID_RESPONSE))).toEqual(VALID_RESPONSE);
  });

  it('should parse JSON inside a fenced block', () => {
    const text = `Here you go:\n\`\`\`json\n${JSON.stringify(VALID_RESPONSE)}\n\`\`\``;

    expect(parseAnalysisResponse(text).summary).toBe('New release shipped');
  });

  it('should default missing lists and unknown categories', () => {
    const result = parseAnalysisResponse(JSON.stringify({ translation: '', summary: 'Hi', category: 'weather' }));

    expect(result).toEqual({ translation: '', summary: 'Hi', tags: [], category: 'other', hints: [] });
  });

  it('should reject text without JSON', () => {
    expect(() => parseAnalysisResponse('I cannot help with that')).toThrow('Could not parse JSON from response');
  });

  it('should name the invalid fields', () => {
    expect(() => parseAnalysisResponse(JSON.stringify({ translation: '', tags: [] }))).toThrow(
      'Analysis response failed validation: summary'
    );
  });
});

// ============================================================
// SERVICES
// ============================================================

describe('AnthropicAnalysisService', () => {
  it('should send the post text and parse the reply', async () => {
    const messages = createMockMessages();
    messages.create.mockResolvedValue(textReply(JSON.stringify(VALID_RESPONSE)));
    const service = new AnthropicAnalysisService({ model: 'test-model', timeoutMs: 1000, messages });

    const result = await service.analyze('Shipping the new release today');

    expect(result.summary).toBe('New release shipped');
    const [params, options] = messages.create.mock.calls[0] ?? [];
    expect(params?.model).toBe('test-model');
    expect(params?.max_tokens).toBe(1024);
    expect(params?.messages).toEqual([
      { role: 'user', content: 'Analyze this post:\n\nShipping the new release today' },
    ]);
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should wrap API failures in AnalysisUnavailableError', async () => {
    const messages = createMockMessages();
    messages.create.mockRejectedValue(new Error('rate limited'));
    const service = new AnthropicAnalysisService({ model: 'test-model', timeoutMs: 1000, messages });

    const error = await service.analyze('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnalysisUnavailableError);
    expect(error instanceof Error && error.message).toBe('Analysis failed: rate limited');
  });

  it('should fail when the reply has no text block', async () => {
    const messages = createMockMessages();
    messages.create.mockResolvedValue({ content: [{ type: 'tool_use' }] });
    const service = new AnthropicAnalysisService({ model: 'test-model', timeoutMs: 1000, messages });

    await expect(service.analyze('hello')).rejects.toThrow('Analysis failed: No text content in response');
  });

  it('should require an API key or a client', () => {
    expect(() => new AnthropicAnalysisService({ model: 'test-model', timeoutMs: 1000 })).toThrow(
      'AnthropicAnalysisService needs an apiKey or a messages client'
    );
  });
});

describe('createAnalysisService', () => {
  it('should return a disabled service without an API key', () => {
    const service = createAnalysisService({ model: 'test-model', timeoutMs: 1000 });

    expect(service).toBeInstanceOf(DisabledAnalysisService);
    expect(service.enabled).toBe(false);
  });

  it('should return the Anthropic service with an API key', () => {
    const service = createAnalysisService({ model: 'test-model', timeoutMs: 1000, apiKey: 'test-secret' });

    expect(service).toBeInstanceOf(AnthropicAnalysisService);
  });
});

// ============================================================
// ENRICHMENT
// ============================================================

describe('buildAnalysisText', () => {
  it('should strip link and media URLs', () => {
    const item = createMockItem({
      content: 'Read https://example.com/notes now https://media.example/1.jpg',
      links: [{ url: 'https://example.com/notes', title: 'notes' }],
      media: [{ type: 'image', url: 'https://media.example/1.jpg' }],
    });

    expect(buildAnalysisText(item)).toBe('Read now');
  });

  it('should append the quoted post', () => {
    const item = createMockItem({ isQuote: true, quoteText: 'Original thought', quoteAuthor: 'Carol' });

    expect(buildAnalysisText(item)).toBe(
      'Shipping the new release today\n\nQuoted post:\nOriginal thought\nAuthor: Carol'
    );
  });

  it('should be empty when only URLs remain', () => {
    const item = createMockItem({
      content: 'https://example.com/notes',
      links: [{ url: 'https://example.com/notes', title: 'notes' }],
    });

    expect(buildAnalysisText(item)).toBe('');
  });
});

describe('enrichItem', () => {
  const createMockService = (analyze: AnalysisService['analyze'], enabled = true): AnalysisService => ({
    enabled,
    analyze,
  });

  it('should attach the analysis', async () => {
    const service = createMockService(async () => ({ ...VALID_RESPONSE, category: 'technology' }));

    const enriched = await enrichItem(service, createMockItem());

    expect(enriched.analysis?.summary).toBe('New release shipped');
    expect(enriched.analysisUnavailable).toBeUndefined();
  });

  it('should keep the item when analysis fails', async () => {
    const enriched = await enrichItem(new DisabledAnalysisService(), createMockItem());

    expect(enriched.analysis).toBeNull();
    expect(enriched.analysisUnavailable).toBe('Analysis disabled: no API key configured');
    expect(enriched.item.id).toBe('123');
  });

  it('should skip analysis when there is no text', async () => {
    const analyze = vi.fn<AnalysisService['analyze']>();

    const enriched = await enrichItem(createMockService(analyze), createMockItem({ content: '' }));

    expect(enriched).toEqual({ item: expect.objectContaining({ id: '123' }), analysis: null, analysisUnavailable: 'no text to analyze' });
    expect(analyze).not.toHaveBeenCalled();
  });
});
