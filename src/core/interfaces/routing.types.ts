import type {
  ClassificationEntities,
  InfoTopic,
  Intent,
  ReferenceField,
} from './classification.types.js';

export type DirectPayload =
  | { kind: 'greeting' }
  | { kind: 'availability'; doctorId: string; date: string; available: boolean; note: string }
  | { kind: 'schedule'; doctorId: string; date: string }
  | { kind: 'price'; serviceId: string; branchId?: string }
  | { kind: 'doctor_info'; doctorId: string }
  | { kind: 'branch_info'; branchId: string }
  | { kind: 'service_info'; serviceId: string }
  | { kind: 'listing'; topic: InfoTopic };

export type ClarifyReason = 'missing' | 'ambiguous' | 'not_found';

export interface ClarifyPrompt {
  reason: ClarifyReason;
  /** What the user wrote, when the field was mentioned but did not resolve. */
  raw?: string;
  /** Candidate ids for the user to choose from. */
  options: string[];
}

export type EscalationReason =
  | 'low_confidence'
  | 'unknown_intent'
  | 'multiple_unresolved'
  | 'no_subject'
  | 'reference_unavailable';

export interface EscalationContext {
  reason: EscalationReason;
  text: string;
  intent: Intent;
  unresolved: ReferenceField[];
}

export type RoutingDecision =
  | { type: 'direct'; payload: DirectPayload }
  | { type: 'clarify'; missingField: ReferenceField; prompt: ClarifyPrompt }
  | { type: 'escalate'; context: EscalationContext };

export interface BookingPrefill {
  doctorId?: string;
  serviceId?: string;
  branchId?: string;
  dateTime?: string;
}

/** Router output: a decision, or a hand-off to the booking flow. */
export type RouteOutcome =
  | { kind: 'decision'; decision: RoutingDecision; intent: Intent; entities: ClassificationEntities }
  | { kind: 'booking'; action: 'start'; prefill: BookingPrefill }
  | { kind: 'booking'; action: 'continue' };
