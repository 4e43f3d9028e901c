import type { IncomingHttpHeaders } from 'http';

import { z } from 'zod';

import type { InboundMessage } from '@core/interfaces/message.types.js';
import type { TikTokTextPayload } from '@infra/tiktok/tiktok.client.js';

import { logger } from '@utils/logger.js';

import {
  epochToIso,
  headerValue,
  toInbound,
  verifyHmacSignature,
  type AdapterOptions,
  type PlatformAdapter,
} from './platform.adapter.js';

const TikTokEvent = z.object({
  user_id: z.string().min(1),
  message: z.string(),
  message_id: z.string().min(1),
  timestamp: z.union([z.number(), z.string()]).optional(),
});

const TikTokWebhook = z.union([z.object({ events: z.array(TikTokEvent) }), TikTokEvent]);

export interface TikTokAdapterOptions extends AdapterOptions<TikTokTextPayload> {
  sendConfigured: boolean;
}

/** Generic `{ user_id, message, message_id }` body, single or batched under `events`. */
export class TikTokAdapter implements PlatformAdapter {
  readonly platform = 'tiktok' as const;

  constructor(private readonly options: TikTokAdapterOptions) {}

  verifyChallenge(): string | null {
    return null;
  }

  verifySignature(rawBody: Buffer, headers: IncomingHttpHeaders): boolean {
    return verifyHmacSignature(
      rawBody,
      headerValue(headers, 'x-tiktok-signature'),
      this.options.appSecret,
      this.options.requireSignature,
    );
  }

  parseInbound(body: unknown, receivedAt: string): InboundMessage[] {
    const parsed = TikTokWebhook.safeParse(body);
    if (!parsed.success) {
      logger.warn('[tiktok] unrecognised webhook payload', { issues: parsed.error.issues.length });
      return [];
    }
    const events = 'events' in parsed.data ? parsed.data.events : [parsed.data];
    return events
      .filter((e) => e.message.trim().length > 0)
      .map((e) => toInbound('tiktok', e.user_id, e.message, e.message_id, epochToIso(e.timestamp, receivedAt)));
  }

  async sendOutbound(recipientId: string, text: string): Promise<void> {
    if (!this.options.sendConfigured) {
      logger.warn('[tiktok] outbound delivery is not configured, reply dropped', { recipientId });
      return;
    }
    await this.options.send({ user_id: recipientId, message: text });
  }
}
