import OpenAI from 'openai';
import { z } from 'zod';

import { INFO_TOPICS, INTENTS } from '@core/interfaces/classification.types.js';
import type {
  ClassifyContext,
  GenerationContext,
  LlmCapability,
  LlmClassification,
  LlmFailure,
  LlmResult,
} from '@core/interfaces/llm.types.js';

import { withRetry } from '@infra/openai/chat.retry.js';

import { DeadlineExceededError, withDeadline } from '@utils/timeout.js';
import { logger } from '@utils/logger.js';

import { PromptBuilder } from './prompt.builder.js';

const nullableString = z.string().nullable();

export const LlmClassificationSchema = z.object({
  intent: z.enum(INTENTS),
  confidence: z.number().min(0).max(1),
  entities: z.object({
    doctor: nullableString,
    service: nullableString,
    branch: nullableString,
    date: nullableString,
    time: nullableString,
    phone: nullableString,
    name: nullableString,
    topic: z.enum(INFO_TOPICS).nullable(),
  }),
});

const NULLABLE_STRING = { type: ['string', 'null'] } as const;

const CLASSIFICATION_JSON_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: ['intent', 'confidence', 'entities'],
  properties: {
    intent: { type: 'string', enum: [...INTENTS] },
    confidence: { type: 'number' },
    entities: {
      type: 'object',
      additionalProperties: false,
      required: ['doctor', 'service', 'branch', 'date', 'time', 'phone', 'name', 'topic'],
      properties: {
        doctor: NULLABLE_STRING,
        service: NULLABLE_STRING,
        branch: NULLABLE_STRING,
        date: NULLABLE_STRING,
        time: NULLABLE_STRING,
        phone: NULLABLE_STRING,
        name: NULLABLE_STRING,
        topic: { type: ['string', 'null'], enum: [...INFO_TOPICS, null] },
      },
    },
  },
} as const;

export interface OpenAILlmOptions {
  intentModel: string;
  agentModel: string;
  timeoutMs: number;
  temperature?: number;
}

function toFailure(err: unknown): LlmFailure {
  if (err instanceof DeadlineExceededError || err instanceof OpenAI.APIConnectionTimeoutError) {
    return { kind: 'timeout', message: err.message };
  }
  if (err instanceof OpenAI.APIUserAbortError || (err instanceof Error && err.name === 'AbortError')) {
    return { kind: 'timeout', message: err.message };
  }
  return { kind: 'provider_error', message: err instanceof Error ? err.message : String(err) };
}

/** LLM capability backed by OpenAI chat completions with strict structured output. */
export class OpenAILlmService implements LlmCapability {
  private readonly prompts = new PromptBuilder();

  constructor(
    private readonly openai: OpenAI | null,
    private readonly options: OpenAILlmOptions,
  ) {}

  async classify(text: string, context: ClassifyContext): Promise<LlmResult<LlmClassification>> {
    const openai = this.openai;
    if (!openai) return { ok: false, failure: { kind: 'not_configured', message: 'OpenAI is not configured' } };

    let content: string | null;
    try {
      content = await withDeadline(async (signal) => {
        const completion = await withRetry(
          () =>
            openai.chat.completions.create(
              {
                model: this.options.intentModel,
                temperature: 0,
                messages: [
                  { role: 'system', content: this.prompts.classification(context) },
                  { role: 'user', content: text },
                ],
                response_format: {
                  type: 'json_schema',
                  json_schema: { name: 'classification', strict: true, schema: CLASSIFICATION_JSON_SCHEMA },
                },
              },
              { signal },
            ),
          { signal, label: 'classifier' },
        );
        return completion.choices[0]?.message?.content ?? null;
      }, this.options.timeoutMs);
    } catch (err) {
      const failure = toFailure(err);
      logger.warn('[llm] classify failed', { kind: failure.kind, message: failure.message });
      return { ok: false, failure };
    }

    if (!content) {
      return { ok: false, failure: { kind: 'schema_violation', message: 'Empty structured response' } };
    }
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      return { ok: false, failure: { kind: 'schema_violation', message: 'Response is not JSON' } };
    }
    const parsed = LlmClassificationSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('[llm] classify schema violation', { issues: parsed.error.issues.length });
      return {
        ok: false,
        failure: { kind: 'schema_violation', message: parsed.error.issues.map((i) => i.path.join('.')).join(', ') },
      };
    }
    return { ok: true, value: parsed.data };
  }

  async generate(context: GenerationContext): Promise<LlmResult<string>> {
    const openai = this.openai;
    if (!openai) return { ok: false, failure: { kind: 'not_configured', message: 'OpenAI is not configured' } };

    try {
      const content = await withDeadline(async (signal) => {
        const completion = await withRetry(
          () =>
            openai.chat.completions.create(
              {
                model: this.options.agentModel,
                temperature: this.options.temperature ?? 0.3,
                max_tokens: 300,
                messages: [
                  { role: 'system', content: this.prompts.generation(context) },
                  { role: 'user', content: context.text },
                ],
              },
              { signal },
            ),
          { signal, label: 'agent' },
        );
        return completion.choices[0]?.message?.content ?? null;
      }, this.options.timeoutMs);

      if (content === null) {
        return { ok: false, failure: { kind: 'schema_violation', message: 'Empty completion' } };
      }
      return { ok: true, value: content };
    } catch (err) {
      const failure = toFailure(err);
      logger.warn('[llm] generate failed', { kind: failure.kind, message: failure.message });
      return { ok: false, failure };
    }
  }
}
