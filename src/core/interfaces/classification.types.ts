export const INTENTS = [
  'greeting',
  'booking_request',
  'availability_query',
  'price_query',
  'info_query',
  'clarification_answer',
  'unknown',
] as const;
export type Intent = (typeof INTENTS)[number];

export const INFO_TOPICS = ['hours', 'branches', 'doctors', 'services', 'contact'] as const;
export type InfoTopic = (typeof INFO_TOPICS)[number];

export type ReferenceKind = 'doctor' | 'service' | 'branch';

/**
 * A name grounded against reference data. `ids` holds the candidates, best first:
 * one id means resolved, none means no match, several means ambiguous.
 */
export interface ReferenceEntity {
  kind: 'reference';
  ref: ReferenceKind;
  raw: string;
  ids: string[];
}

export interface DateEntity {
  kind: 'date';
  iso: string;
  raw: string;
}

export interface TextEntity {
  kind: 'text';
  value: string;
}

export interface TopicEntity {
  kind: 'enum';
  value: InfoTopic;
}

export interface ClassificationEntities {
  doctor?: ReferenceEntity;
  service?: ReferenceEntity;
  branch?: ReferenceEntity;
  date?: DateEntity;
  time?: TextEntity;
  phone?: TextEntity;
  name?: TextEntity;
  topic?: TopicEntity;
}

export type EntityName = keyof ClassificationEntities;
export type ReferenceField = ReferenceKind;

export type ClassificationSource = 'rules' | 'llm' | 'fallback';

export interface ClassificationResult {
  readonly intent: Intent;
  readonly entities: Readonly<ClassificationEntities>;
  readonly confidence: number;
  readonly source: ClassificationSource;
  readonly warnings: readonly string[];
}

export function isResolved(entity: ReferenceEntity | undefined): entity is ReferenceEntity {
  return entity !== undefined && entity.ids.length === 1;
}
