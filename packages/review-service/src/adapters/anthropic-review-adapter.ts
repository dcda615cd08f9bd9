import Anthropic from '@anthropic-ai/sdk';
import {
  AiController,
  ContentSummarizer,
  ControllerReviewResult,
  RelevanceAssessment,
  RelevanceAssessmentSchema,
  RelevanceScorer,
  ReviewCriteria,
  TransientActivityError,
  z,
} from '@contentreview/core';
import type { PayloadResolver } from './file-payload-resolver';
import type { Logger } from '../utils/logger';

export const MALFORMED_MODEL_RESPONSE = 'MALFORMED_MODEL_RESPONSE';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

const ScoreResponseSchema = RelevanceAssessmentSchema.extend({
  score: z.number(),
});

const ControllerResponseSchema = z.object({
  approved: z.boolean(),
  rationale: z.string().default(''),
});

const SummaryResponseSchema = z.object({
  summary: z.string().min(1),
});

export interface AnthropicReviewAdapterOptions {
  model?: string;
  maxTokens?: number;
}

/** Extracts the JSON object of a model reply, with or without a code fence. */
export function extractJson(responseText: string): unknown {
  let jsonText = responseText.trim();

  const jsonMatch = jsonText.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (jsonMatch) {
    jsonText = jsonMatch[1].trim();
  }

  try {
    return JSON.parse(jsonText);
  } catch {
    throw new TransientActivityError('Model reply is not valid JSON', MALFORMED_MODEL_RESPONSE);
  }
}

/**
 * Relevance scoring, controller review and summaries on one Anthropic client.
 * Replies must be JSON; a reply that does not fit the expected shape counts
 * as a transient failure so the activity retries it.
 */
export class AnthropicReviewAdapter implements RelevanceScorer, AiController, ContentSummarizer {
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(
    private readonly client: Anthropic,
    private readonly payloads: PayloadResolver,
    private readonly logger: Logger,
    options: AnthropicReviewAdapterOptions = {}
  ) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 1024;
  }

  static fromApiKey(
    apiKey: string,
    payloads: PayloadResolver,
    logger: Logger,
    options?: AnthropicReviewAdapterOptions
  ): AnthropicReviewAdapter {
    return new AnthropicReviewAdapter(new Anthropic({ apiKey }), payloads, logger, options);
  }

  async assess(
    contentItemId: string,
    payloadRef: string,
    criteria: ReviewCriteria
  ): Promise<RelevanceAssessment> {
    const content = await this.payloads.resolve(payloadRef);
    const prompt = `You are reviewing a submission for a curated knowledge collection.
Rate how relevant the content is to the review criteria on a scale from 0 to 10.

## Review criteria:
${JSON.stringify(criteria, null, 2)}

## Content:
"""
${content}
"""

## Output (JSON only):
{
  "score": 7.5,
  "topics": ["main topics of the content"],
  "entities": ["named entities the content mentions"],
  "rationale": "one or two sentences"
}`;

    const assessment = await this.complete(prompt, ScoreResponseSchema, contentItemId);
    this.logger.debug({ contentItemId, score: assessment.score }, 'Content scored');
    return assessment;
  }

  async review(
    contentItemId: string,
    payloadRef: string,
    score: number,
    criteria: ReviewCriteria
  ): Promise<ControllerReviewResult> {
    const content = await this.payloads.resolve(payloadRef);
    const prompt = `You are the final reviewer for a curated knowledge collection.
An automatic relevance check scored this submission ${score} out of 10, which is not
conclusive. Decide whether it should be published.

## Review criteria:
${JSON.stringify(criteria, null, 2)}

## Content:
"""
${content}
"""

## Output (JSON only):
{ "approved": true, "rationale": "why" }`;

    return this.complete(prompt, ControllerResponseSchema, contentItemId);
  }

  async summarize(contentItemId: string, payloadRef: string): Promise<{ summary: string }> {
    const content = await this.payloads.resolve(payloadRef);
    const prompt = `Summarize the following content in at most three sentences for a publication notice.

"""
${content}
"""

## Output (JSON only):
{ "summary": "..." }`;

    return this.complete(prompt, SummaryResponseSchema, contentItemId);
  }

  private async complete<T>(
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    contentItemId: string
  ): Promise<T> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });

    const content = response.content[0];
    if (!content || content.type !== 'text') {
      throw new TransientActivityError('Model reply has no text content', MALFORMED_MODEL_RESPONSE);
    }

    const parsed = schema.safeParse(extractJson(content.text));
    if (!parsed.success) {
      this.logger.warn(
        { contentItemId, issues: parsed.error.issues.map((issue) => issue.message) },
        'Model reply does not match the expected shape'
      );
      throw new TransientActivityError(
        'Model reply does not match the expected shape',
        MALFORMED_MODEL_RESPONSE
      );
    }
    return parsed.data;
  }
}
