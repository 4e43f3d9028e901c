import { DateTime } from 'luxon';

import type {
  ClassificationEntities,
  ClassificationResult,
  Intent,
  ReferenceEntity,
} from '@core/interfaces/classification.types.js';
import type { ConversationMemory, PendingClarification } from '@core/interfaces/conversation.types.js';
import type { LlmCapability, LlmClassification, LlmResult } from '@core/interfaces/llm.types.js';
import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';

import { parseDate, parseTime } from '@utils/date.parser.js';
import { logger } from '@utils/logger.js';
import { normalizePhone } from '@utils/phone.js';
import { toLatinDigits } from '@utils/text.js';

import { extractEntities, groundReference } from './entity.extractor.js';
import {
  loadDefaultLexicon,
  pickIntent,
  scoreIntents,
  STRONG_RULE_CONFIDENCE,
  type KeywordLexicon,
  type RuleVerdict,
} from './intent.rules.js';

export interface ClassifierOptions {
  fuzzyThreshold: number;
  timezone: string;
  lexicon?: KeywordLexicon;
}

export interface ClassifyInput {
  text: string;
  memory: ConversationMemory;
  snapshot: ReferenceSnapshot | null;
}

const WEAK_CONFIDENCE = 0.6;
const MAX_NAMES_IN_PROMPT = 40;

function freeze(result: ClassificationResult): ClassificationResult {
  return Object.freeze({ ...result, entities: Object.freeze({ ...result.entities }), warnings: Object.freeze([...result.warnings]) });
}

/** Rule output plus the intents its keywords could not separate. */
export interface RulePass {
  result: ClassificationResult;
  tiedWith: readonly Intent[];
}

/**
 * Deterministic pass first. Any rule match wins; the LLM only picks between
 * tied rule intents, or classifies text the rules could not place at all.
 */
export class ClassifierService {
  private readonly lexicon: KeywordLexicon;

  constructor(
    private readonly llm: LlmCapability,
    private readonly options: ClassifierOptions,
  ) {
    this.lexicon = options.lexicon ?? loadDefaultLexicon();
  }

  async classify(input: ClassifyInput): Promise<ClassificationResult> {
    const today = DateTime.now().setZone(this.options.timezone);
    const rules = this.classifyWithRules(input, today);
    if (rules && !rules.tiedWith.length) return freeze(rules.result);

    const outcome = await this.llm.classify(input.text, this.buildContext(input, today));
    if (rules) return freeze(this.breakTie(rules, outcome));
    if (outcome.ok) return freeze(this.fromLlm(outcome.value, input.snapshot, today));

    logger.info('[classifier] llm unavailable and no rule matched', { kind: outcome.failure.kind });
    return freeze({
      intent: 'unknown',
      entities: {},
      confidence: 0,
      source: 'fallback',
      warnings: [`llm_${outcome.failure.kind}`],
    });
  }

  /** Rule-only classification, or null when nothing matched. */
  classifyWithRules(input: ClassifyInput, today: DateTime): RulePass | null {
    const entities = extractEntities(input.text, input.snapshot, {
      threshold: this.options.fuzzyThreshold,
      today,
    });
    const scores = scoreIntents(input.text, this.lexicon);
    let verdict: RuleVerdict | null = pickIntent(scores);

    if (input.memory.pending && (!verdict || verdict.confidence < STRONG_RULE_CONFIDENCE)) {
      const answer = this.answerPending(input.text, input.memory.pending, entities, input.snapshot);
      if (answer) return { result: answer, tiedWith: [] };
    }

    if (scores.topic === 'hours' && entities.doctor && (!verdict || verdict.intent === 'info_query')) {
      verdict = { intent: 'availability_query', confidence: STRONG_RULE_CONFIDENCE };
    } else if (!verdict && scores.topic) {
      verdict = { intent: 'info_query', confidence: STRONG_RULE_CONFIDENCE };
    }

    if (!verdict) {
      if (entities.doctor && entities.date) verdict = { intent: 'availability_query', confidence: WEAK_CONFIDENCE };
      else if (entities.doctor || entities.service || entities.branch) {
        verdict = { intent: 'info_query', confidence: WEAK_CONFIDENCE };
      }
    }
    if (!verdict) return null;

    if (scores.topic) entities.topic = { kind: 'enum', value: scores.topic };
    return {
      result: { intent: verdict.intent, entities, confidence: verdict.confidence, source: 'rules', warnings: [] },
      tiedWith: verdict.tiedWith ?? [],
    };
  }

  /** The rule result stands; only its intent may move to another tied candidate. */
  private breakTie(rules: RulePass, outcome: LlmResult<LlmClassification>): ClassificationResult {
    const { result } = rules;
    if (!outcome.ok) {
      logger.info('[classifier] llm unavailable, keeping rule tie-break', { kind: outcome.failure.kind, intent: result.intent });
      return { ...result, warnings: [...result.warnings, `llm_${outcome.failure.kind}`] };
    }
    const picked = outcome.value.intent;
    if (picked !== result.intent && rules.tiedWith.includes(picked)) return { ...result, intent: picked };
    return result;
  }

  private answerPending(
    text: string,
    pending: PendingClarification,
    entities: ClassificationEntities,
    snapshot: ReferenceSnapshot | null,
  ): ClassificationResult | null {
    const field = pending.missingField;
    let answer: ReferenceEntity | undefined;

    const choice = /^\s*(\d{1,2})\s*$/.exec(toLatinDigits(text));
    if (choice) {
      const id = pending.options[Number(choice[1]) - 1];
      if (id) answer = { kind: 'reference', ref: field, raw: text.trim(), ids: [id] };
    }

    if (!answer && snapshot) {
      const found = entities[field] ?? groundReference(text, field, snapshot, this.options.fuzzyThreshold);
      const narrowed = pending.options.length ? found.ids.filter((id) => pending.options.includes(id)) : found.ids;
      if (narrowed.length) answer = { ...found, ids: narrowed };
    }

    if (!answer) return null;
    const answered: ClassificationEntities = {};
    answered[field] = answer;
    return {
      intent: 'clarification_answer',
      entities: answered,
      confidence: 0.9,
      source: 'rules',
      warnings: [],
    };
  }

  private buildContext(input: ClassifyInput, today: DateTime) {
    const names = <T extends { name: string }>(rows: ReadonlyMap<string, T> | undefined) =>
      rows ? Array.from(rows.values(), (row) => row.name).slice(0, MAX_NAMES_IN_PROMPT) : [];
    return {
      history: input.memory.turns,
      today: today.toISODate() ?? '',
      timezone: this.options.timezone,
      doctors: names(input.snapshot?.doctors),
      services: names(input.snapshot?.services),
      branches: names(input.snapshot?.branches),
    };
  }

  private fromLlm(
    out: LlmClassification,
    snapshot: ReferenceSnapshot | null,
    today: DateTime,
  ): ClassificationResult {
    const entities: ClassificationEntities = {};
    const threshold = this.options.fuzzyThreshold;
    const ground = (raw: string | null, kind: 'doctor' | 'service' | 'branch'): ReferenceEntity | undefined => {
      if (!raw || !raw.trim()) return undefined;
      return snapshot
        ? groundReference(raw, kind, snapshot, threshold)
        : { kind: 'reference', ref: kind, raw: raw.trim(), ids: [] };
    };

    const doctor = ground(out.entities.doctor, 'doctor');
    if (doctor) entities.doctor = doctor;
    const service = ground(out.entities.service, 'service');
    if (service) entities.service = service;
    const branch = ground(out.entities.branch, 'branch');
    if (branch) entities.branch = branch;

    if (out.entities.date) {
      const iso = DateTime.fromISO(out.entities.date, { zone: this.options.timezone });
      const parsed = iso.isValid && /^\d{4}-\d{2}-\d{2}$/.test(out.entities.date)
        ? { iso: out.entities.date, raw: out.entities.date }
        : parseDate(out.entities.date, today);
      if (parsed) entities.date = { kind: 'date', iso: parsed.iso, raw: parsed.raw };
    }
    if (out.entities.time) {
      const parsed = /^\d{2}:\d{2}$/.test(out.entities.time) ? out.entities.time : parseTime(out.entities.time)?.hhmm;
      if (parsed) entities.time = { kind: 'text', value: parsed };
    }
    if (out.entities.phone) {
      const phone = normalizePhone(out.entities.phone);
      if (phone) entities.phone = { kind: 'text', value: phone };
    }
    if (out.entities.name?.trim()) entities.name = { kind: 'text', value: out.entities.name.trim() };
    if (out.entities.topic) entities.topic = { kind: 'enum', value: out.entities.topic };

    return {
      intent: out.intent,
      entities,
      confidence: Math.min(1, Math.max(0, out.confidence)),
      source: 'llm',
      warnings: [],
    };
  }
}
