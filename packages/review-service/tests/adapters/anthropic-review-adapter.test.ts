import { describe, it, expect, vi, beforeEach } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import { TransientActivityError } from '@contentreview/core';
import {
  AnthropicReviewAdapter,
  DEFAULT_MODEL,
  MALFORMED_MODEL_RESPONSE,
  extractJson,
} from '../../src/adapters/anthropic-review-adapter';
import { silentLogger } from '../helpers/logger';

const mockCreate = vi.fn();
const mockClient = {
  messages: { create: mockCreate },
} as unknown as Anthropic;

function reply(text: string) {
  return { content: [{ type: 'text', text }] };
}

describe('AnthropicReviewAdapter', () => {
  const payloads = { resolve: vi.fn(async (_payloadRef: string) => 'Replaying a journal rebuilds state.') };
  let adapter: AnthropicReviewAdapter;

  beforeEach(() => {
    vi.clearAllMocks();
    adapter = new AnthropicReviewAdapter(mockClient, payloads, silentLogger);
  });

  describe('assess', () => {
    it('should parse a fenced JSON assessment', async () => {
      mockCreate.mockResolvedValueOnce(
        reply(
          '```json\n{"score": 7.5, "topics": ["replay"], "entities": ["Postgres"], "rationale": "on topic"}\n```'
        )
      );

      const assessment = await adapter.assess('item-1', 'submissions/item-1.md', { topic: 'workflows' });

      expect(assessment).toEqual({
        score: 7.5,
        topics: ['replay'],
        entities: ['Postgres'],
        rationale: 'on topic',
      });
      expect(payloads.resolve).toHaveBeenCalledWith('submissions/item-1.md');
      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: DEFAULT_MODEL, max_tokens: 1024 })
      );
      const [request] = mockCreate.mock.calls[0];
      expect(request.messages[0].content).toContain('Replaying a journal rebuilds state.');
      expect(request.messages[0].content).toContain('"topic": "workflows"');
    });

    it('should fill in missing optional fields', async () => {
      mockCreate.mockResolvedValueOnce(reply('{"score": 3}'));

      await expect(adapter.assess('item-1', 'ref', {})).resolves.toEqual({
        score: 3,
        topics: [],
        entities: [],
        rationale: '',
      });
    });

    it('should treat a reply that is not JSON as transient', async () => {
      mockCreate.mockResolvedValueOnce(reply('I would rate this a seven.'));

      const error = await adapter.assess('item-1', 'ref', {}).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransientActivityError);
      expect(error).toMatchObject({ code: MALFORMED_MODEL_RESPONSE });
    });

    it('should treat a reply of the wrong shape as transient', async () => {
      mockCreate.mockResolvedValueOnce(reply('{"relevance": "high"}'));

      await expect(adapter.assess('item-1', 'ref', {})).rejects.toThrow(
        'Model reply does not match the expected shape'
      );
    });

    it('should reject a reply without text content', async () => {
      mockCreate.mockResolvedValueOnce({ content: [{ type: 'tool_use', id: 'tool-1', name: 'x', input: {} }] });

      await expect(adapter.assess('item-1', 'ref', {})).rejects.toThrow('Model reply has no text content');
    });
  });

  describe('review', () => {
    it('should default the rationale to an empty string', async () => {
      mockCreate.mockResolvedValueOnce(reply('{"approved": false}'));

      await expect(adapter.review('item-1', 'ref', 6, {})).resolves.toEqual({
        approved: false,
        rationale: '',
      });
      expect(mockCreate.mock.calls[0][0].messages[0].content).toContain('scored this submission 6 out of 10');
    });
  });

  describe('summarize', () => {
    it('should use the configured model', async () => {
      adapter = new AnthropicReviewAdapter(mockClient, payloads, silentLogger, {
        model: 'claude-test-model',
        maxTokens: 256,
      });
      mockCreate.mockResolvedValueOnce(reply('{"summary": "Journals make workflows resumable."}'));

      await expect(adapter.summarize('item-1', 'ref')).resolves.toEqual({
        summary: 'Journals make workflows resumable.',
      });
      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'claude-test-model', max_tokens: 256 })
      );
    });
  });

  describe('extractJson', () => {
    it('should parse unfenced JSON', () => {
      expect(extractJson('  {"a": 1}  ')).toEqual({ a: 1 });
    });

    it('should parse a fence without a language tag', () => {
      expect(extractJson('Here you go:\n```\n{"a": 2}\n```')).toEqual({ a: 2 });
    });
  });
});
