import type {
  ClassificationEntities,
  ClassificationResult,
  Intent,
  ReferenceField,
} from '@core/interfaces/classification.types.js';
import { isResolved } from '@core/interfaces/classification.types.js';
import type { BookingSession } from '@core/interfaces/booking.types.js';
import { isOpen } from '@core/interfaces/booking.types.js';
import type { PendingClarification } from '@core/interfaces/conversation.types.js';
import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';
import type {
  BookingPrefill,
  ClarifyPrompt,
  DirectPayload,
  EscalationReason,
  RouteOutcome,
} from '@core/interfaces/routing.types.js';

import { findAvailability } from '@services/reference/reference.snapshot.js';

export interface RouterOptions {
  minConfidence: number;
  /** Offer every candidate as a numbered choice when the table is at most this big. */
  maxListedOptions?: number;
}

export interface RouteInput {
  text: string;
  classification: ClassificationResult;
  snapshot: ReferenceSnapshot | null;
  session: BookingSession | null;
  pending?: PendingClarification;
  /** Clinic-local date, YYYY-MM-DD. */
  today: string;
}

const SUBJECT_ORDER: readonly ReferenceField[] = ['doctor', 'service', 'branch'];

function escalate(
  reason: EscalationReason,
  text: string,
  intent: Intent,
  entities: ClassificationEntities,
  unresolved: ReferenceField[] = [],
): RouteOutcome {
  return {
    kind: 'decision',
    intent,
    entities,
    decision: { type: 'escalate', context: { reason, text, intent, unresolved } },
  };
}

export class RouterService {
  private readonly maxListedOptions: number;

  constructor(private readonly options: RouterOptions) {
    this.maxListedOptions = options.maxListedOptions ?? 8;
  }

  route(input: RouteInput): RouteOutcome {
    if (isOpen(input.session)) {
      return { kind: 'booking', action: 'continue' };
    }

    const { classification, text, snapshot } = input;
    let intent = classification.intent;
    let entities: ClassificationEntities = { ...classification.entities };
    let confidence = classification.confidence;

    if (intent === 'clarification_answer') {
      if (!input.pending) return escalate('unknown_intent', text, intent, entities);
      intent = input.pending.intent;
      entities = { ...input.pending.entities, ...classification.entities };
      confidence = Math.max(confidence, this.options.minConfidence);
    }

    if (intent === 'unknown') return escalate('unknown_intent', text, intent, entities);
    if (confidence < this.options.minConfidence) return escalate('low_confidence', text, intent, entities);

    if (intent === 'booking_request') {
      return { kind: 'booking', action: 'start', prefill: this.prefill(entities) };
    }
    if (intent === 'greeting') {
      return { kind: 'decision', intent, entities, decision: { type: 'direct', payload: { kind: 'greeting' } } };
    }
    if (!snapshot) return escalate('reference_unavailable', text, intent, entities);

    const required = this.requiredFields(intent, entities);
    if (required === null) {
      if (entities.topic) {
        return {
          kind: 'decision',
          intent,
          entities,
          decision: { type: 'direct', payload: { kind: 'listing', topic: entities.topic.value } },
        };
      }
      return escalate('no_subject', text, intent, entities);
    }

    const unresolved = required.filter((field) => !isResolved(entities[field]));
    if (unresolved.length >= 2) return escalate('multiple_unresolved', text, intent, entities, unresolved);
    if (unresolved.length === 1) {
      const field = unresolved[0];
      return {
        kind: 'decision',
        intent,
        entities,
        decision: { type: 'clarify', missingField: field, prompt: this.clarifyPrompt(field, entities, snapshot) },
      };
    }

    return {
      kind: 'decision',
      intent,
      entities,
      decision: { type: 'direct', payload: this.directPayload(intent, entities, snapshot, input.today) },
    };
  }

  /** Fields that must resolve for a Direct answer; null when the intent has no subject. */
  private requiredFields(intent: Intent, entities: ClassificationEntities): ReferenceField[] | null {
    switch (intent) {
      case 'availability_query':
        return ['doctor'];
      case 'price_query':
        return entities.branch ? ['service', 'branch'] : ['service'];
      case 'info_query': {
        const mentioned = SUBJECT_ORDER.filter((field) => entities[field] !== undefined);
        return mentioned.length ? mentioned : null;
      }
      default:
        return [];
    }
  }

  private clarifyPrompt(
    field: ReferenceField,
    entities: ClassificationEntities,
    snapshot: ReferenceSnapshot,
  ): ClarifyPrompt {
    const entity = entities[field];
    if (entity && entity.ids.length > 1) {
      return { reason: 'ambiguous', raw: entity.raw, options: entity.ids };
    }
    const table = field === 'doctor' ? snapshot.doctors : field === 'service' ? snapshot.services : snapshot.branches;
    const options = table.size <= this.maxListedOptions ? Array.from(table.keys()) : [];
    if (entity) return { reason: 'not_found', raw: entity.raw, options };
    return { reason: 'missing', options };
  }

  private directPayload(
    intent: Intent,
    entities: ClassificationEntities,
    snapshot: ReferenceSnapshot,
    today: string,
  ): DirectPayload {
    const id = (field: ReferenceField): string | undefined => {
      const entity = entities[field];
      return isResolved(entity) ? entity.ids[0] : undefined;
    };
    const doctorId = id('doctor');
    const serviceId = id('service');
    const branchId = id('branch');

    if (intent === 'availability_query' && doctorId) {
      const date = entities.date?.iso ?? today;
      const row = findAvailability(snapshot, date, doctorId);
      if (row) return { kind: 'availability', doctorId, date, available: row.available, note: row.note };
      return { kind: 'schedule', doctorId, date };
    }
    if (intent === 'price_query' && serviceId) {
      return branchId ? { kind: 'price', serviceId, branchId } : { kind: 'price', serviceId };
    }
    if (doctorId) return { kind: 'doctor_info', doctorId };
    if (serviceId) return { kind: 'service_info', serviceId };
    if (branchId) return { kind: 'branch_info', branchId };
    return { kind: 'greeting' };
  }

  private prefill(entities: ClassificationEntities): BookingPrefill {
    const prefill: BookingPrefill = {};
    if (isResolved(entities.doctor)) prefill.doctorId = entities.doctor.ids[0];
    if (isResolved(entities.service)) prefill.serviceId = entities.service.ids[0];
    if (isResolved(entities.branch)) prefill.branchId = entities.branch.ids[0];
    if (entities.date) {
      prefill.dateTime = entities.time ? `${entities.date.iso} ${entities.time.value}` : entities.date.iso;
    }
    return prefill;
  }
}

