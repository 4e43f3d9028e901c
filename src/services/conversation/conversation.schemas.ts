import { z } from 'zod';

import { BOOKING_STEPS } from '@core/interfaces/booking.types.js';
import { INFO_TOPICS, INTENTS } from '@core/interfaces/classification.types.js';
import { PLATFORMS } from '@core/interfaces/message.types.js';

const ReferenceEntitySchema = z.object({
  kind: z.literal('reference'),
  ref: z.enum(['doctor', 'service', 'branch']),
  raw: z.string(),
  ids: z.array(z.string()),
});

const TextEntitySchema = z.object({ kind: z.literal('text'), value: z.string() });

export const EntitiesSchema = z.object({
  doctor: ReferenceEntitySchema.optional(),
  service: ReferenceEntitySchema.optional(),
  branch: ReferenceEntitySchema.optional(),
  date: z.object({ kind: z.literal('date'), iso: z.string(), raw: z.string() }).optional(),
  time: TextEntitySchema.optional(),
  phone: TextEntitySchema.optional(),
  name: TextEntitySchema.optional(),
  topic: z.object({ kind: z.literal('enum'), value: z.enum(INFO_TOPICS) }).optional(),
});

export const ConversationMemorySchema = z.object({
  turns: z.array(z.object({ role: z.enum(['user', 'assistant']), text: z.string(), at: z.string() })),
  pending: z
    .object({
      intent: z.enum(INTENTS),
      entities: EntitiesSchema,
      missingField: z.enum(['doctor', 'service', 'branch']),
      options: z.array(z.string()),
      askedAt: z.string(),
    })
    .optional(),
});

export const BookingSessionSchema = z.object({
  id: z.string(),
  platform: z.enum(PLATFORMS),
  userId: z.string(),
  state: z.enum(['name', 'phone', 'service', 'branch', 'date_time', 'done', 'cancelled']),
  fields: z.object({
    doctorId: z.string().optional(),
    name: z.string().optional(),
    phone: z.string().optional(),
    serviceId: z.string().optional(),
    branchId: z.string().nullable().optional(),
    dateTime: z.string().nullable().optional(),
  }),
  attempts: z.number().int().nonnegative(),
  pendingChoice: z.object({ field: z.enum(BOOKING_STEPS), candidateIds: z.array(z.string()) }).optional(),
  version: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
  reservationId: z.string().optional(),
  closedReason: z.enum(['completed', 'user_cancelled', 'timeout', 'too_many_attempts']).optional(),
});
