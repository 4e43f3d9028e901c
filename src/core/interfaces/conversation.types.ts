import type { ClassificationEntities, Intent, ReferenceField } from './classification.types.js';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  text: string;
  at: string;
}

/** A Clarify that is waiting for the user's answer. */
export interface PendingClarification {
  intent: Intent;
  entities: ClassificationEntities;
  missingField: ReferenceField;
  options: string[];
  askedAt: string;
}

export interface ConversationMemory {
  turns: ConversationTurn[];
  pending?: PendingClarification;
}
