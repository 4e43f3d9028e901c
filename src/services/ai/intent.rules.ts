import { readFileSync } from 'fs';

import { z } from 'zod';

import type { InfoTopic, Intent } from '@core/interfaces/classification.types.js';
import { INFO_TOPICS } from '@core/interfaces/classification.types.js';

import { tokenize } from '@utils/text.js';

const RuleIntent = z.enum(['greeting', 'booking_request', 'availability_query', 'price_query', 'info_query']);
export type RuleIntent = z.infer<typeof RuleIntent>;

const KeywordFile = z.object({
  intents: z.record(RuleIntent, z.array(z.string().min(1))),
  topics: z.record(z.enum(INFO_TOPICS), z.array(z.string().min(1))),
});

export interface KeywordLexicon {
  intents: Map<RuleIntent, string[]>;
  topics: Map<InfoTopic, string[]>;
}

/** Priority when two intents tie on keyword hits. */
const PRIORITY: readonly RuleIntent[] = [
  'booking_request',
  'availability_query',
  'price_query',
  'info_query',
  'greeting',
];

function normalizeKeyword(keyword: string): string {
  return tokenize(keyword).join(' ');
}

export function buildLexicon(input: unknown): KeywordLexicon {
  const parsed = KeywordFile.parse(input);
  const intents = new Map<RuleIntent, string[]>();
  for (const intent of RuleIntent.options) {
    intents.set(intent, (parsed.intents[intent] ?? []).map(normalizeKeyword).filter(Boolean));
  }
  const topics = new Map<InfoTopic, string[]>();
  for (const topic of INFO_TOPICS) {
    topics.set(topic, (parsed.topics[topic] ?? []).map(normalizeKeyword).filter(Boolean));
  }
  return { intents, topics };
}

let defaultLexicon: KeywordLexicon | null = null;

export function loadDefaultLexicon(): KeywordLexicon {
  if (!defaultLexicon) {
    const url = new URL('../../../data/intent-keywords.json', import.meta.url);
    defaultLexicon = buildLexicon(JSON.parse(readFileSync(url, 'utf8')));
  }
  return defaultLexicon;
}

function countHits(tokens: string[], padded: string, keywords: string[]): number {
  let hits = 0;
  for (const keyword of keywords) {
    if (keyword.includes(' ')) {
      if (padded.includes(` ${keyword} `)) hits += 1;
    } else if (tokens.includes(keyword)) {
      hits += 1;
    }
  }
  return hits;
}

export interface RuleScores {
  hits: Map<RuleIntent, number>;
  topic?: InfoTopic;
}

export function scoreIntents(text: string, lexicon: KeywordLexicon): RuleScores {
  const tokens = tokenize(text);
  const padded = ` ${tokens.join(' ')} `;
  const hits = new Map<RuleIntent, number>();
  for (const [intent, keywords] of lexicon.intents) {
    const n = countHits(tokens, padded, keywords);
    if (n > 0) hits.set(intent, n);
  }
  let topic: InfoTopic | undefined;
  let topicHits = 0;
  for (const [name, keywords] of lexicon.topics) {
    const n = countHits(tokens, padded, keywords);
    if (n > topicHits) {
      topic = name;
      topicHits = n;
    }
  }
  return { hits, topic };
}

export interface RuleVerdict {
  intent: Intent;
  confidence: number;
  /** Intents that scored equally, in priority order; set only on a tie. */
  tiedWith?: readonly Intent[];
}

export const STRONG_RULE_CONFIDENCE = 0.7;
const WEAK_RULE_CONFIDENCE = 0.5;

/**
 * Picks the intent with the most keyword hits. A unique winner is strong; a tie
 * keeps the higher-priority intent at weak confidence. Greeting only wins alone.
 */
export function pickIntent(scores: RuleScores): RuleVerdict | null {
  const hits = new Map(scores.hits);
  if (hits.size > 1) hits.delete('greeting');
  if (!hits.size) return null;

  let best = 0;
  for (const n of hits.values()) best = Math.max(best, n);
  const leaders = PRIORITY.filter((intent) => hits.get(intent) === best);
  const intent = leaders[0];
  if (leaders.length > 1) return { intent, confidence: WEAK_RULE_CONFIDENCE, tiedWith: leaders };
  return { intent, confidence: Math.min(0.95, STRONG_RULE_CONFIDENCE + 0.1 * (best - 1)) };
}
