import type { Intent, InfoTopic } from './classification.types.js';
import type { Locale } from './message.types.js';
import type { ConversationTurn } from './conversation.types.js';

export type LlmFailureKind = 'timeout' | 'schema_violation' | 'provider_error' | 'not_configured';

export interface LlmFailure {
  kind: LlmFailureKind;
  message: string;
}

export type LlmResult<T> = { ok: true; value: T } | { ok: false; failure: LlmFailure };

/** Raw structured output; names are grounded against reference data afterwards. */
export interface LlmClassification {
  intent: Intent;
  confidence: number;
  entities: {
    doctor: string | null;
    service: string | null;
    branch: string | null;
    date: string | null;
    time: string | null;
    phone: string | null;
    name: string | null;
    topic: InfoTopic | null;
  };
}

export interface ClassifyContext {
  history: ConversationTurn[];
  today: string;
  timezone: string;
  doctors: string[];
  services: string[];
  branches: string[];
}

export interface GenerationContext {
  text: string;
  locale: Locale;
  history: ConversationTurn[];
  facts: string[];
}

export interface LlmCapability {
  classify(text: string, context: ClassifyContext): Promise<LlmResult<LlmClassification>>;
  generate(context: GenerationContext): Promise<LlmResult<string>>;
}
