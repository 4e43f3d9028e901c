import type { Platform } from './message.types.js';

export const BOOKING_STEPS = ['name', 'phone', 'service', 'branch', 'date_time'] as const;
export type BookingField = (typeof BOOKING_STEPS)[number];
export type BookingState = BookingField | 'done' | 'cancelled';

export const OPTIONAL_FIELDS: readonly BookingField[] = ['branch', 'date_time'];

export type ClosedReason = 'completed' | 'user_cancelled' | 'timeout' | 'too_many_attempts';

/** `null` on an optional field records that the user declined it. */
export interface BookingFields {
  /** Doctor named in the booking request; never asked for. */
  doctorId?: string;
  name?: string;
  phone?: string;
  serviceId?: string;
  branchId?: string | null;
  dateTime?: string | null;
}

export interface PendingChoice {
  field: BookingField;
  candidateIds: string[];
}

export interface BookingSession {
  id: string;
  platform: Platform;
  userId: string;
  state: BookingState;
  fields: BookingFields;
  /** Consecutive invalid answers for the current field. */
  attempts: number;
  pendingChoice?: PendingChoice;
  version: number;
  createdAt: string;
  updatedAt: string;
  reservationId?: string;
  closedReason?: ClosedReason;
}

export interface ReservationDraft {
  platform: Platform;
  userId: string;
  name: string;
  phone: string;
  serviceId: string;
  doctorId: string | null;
  branchId: string | null;
  requestedAt: string | null;
}

export type ReservationStatus = 'pending' | 'confirmed' | 'cancelled';

export interface Reservation extends ReservationDraft {
  id: string;
  idempotencyKey: string;
  status: ReservationStatus;
  createdAt: string;
}

export function isOpen(session: BookingSession | null | undefined): session is BookingSession {
  return session !== null && session !== undefined && session.state !== 'done' && session.state !== 'cancelled';
}
