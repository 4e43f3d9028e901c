import type { IncomingHttpHeaders } from 'http';

import { z } from 'zod';

import type { InboundMessage } from '@core/interfaces/message.types.js';
import type { InstagramTextPayload } from '@infra/instagram/instagram.client.js';

import { logger } from '@utils/logger.js';

import {
  epochToIso,
  headerValue,
  toInbound,
  verifyHmacSignature,
  verifyHubChallenge,
  type AdapterOptions,
  type PlatformAdapter,
  type WebhookQuery,
} from './platform.adapter.js';

const InstagramWebhook = z.object({
  entry: z
    .array(
      z.object({
        messaging: z
          .array(
            z.object({
              sender: z.object({ id: z.string() }),
              timestamp: z.number().optional(),
              message: z
                .object({
                  mid: z.string(),
                  text: z.string().optional(),
                  is_echo: z.boolean().optional(),
                })
                .optional(),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

/** Instagram messaging uses the Messenger Platform envelope. */
export class InstagramAdapter implements PlatformAdapter {
  readonly platform = 'instagram' as const;

  constructor(private readonly options: AdapterOptions<InstagramTextPayload>) {}

  verifyChallenge(query: WebhookQuery): string | null {
    return verifyHubChallenge(query, this.options.verifyToken);
  }

  verifySignature(rawBody: Buffer, headers: IncomingHttpHeaders): boolean {
    return verifyHmacSignature(
      rawBody,
      headerValue(headers, 'x-hub-signature-256'),
      this.options.appSecret,
      this.options.requireSignature,
    );
  }

  parseInbound(body: unknown, receivedAt: string): InboundMessage[] {
    const parsed = InstagramWebhook.safeParse(body);
    if (!parsed.success) {
      logger.warn('[instagram] unrecognised webhook payload', { issues: parsed.error.issues.length });
      return [];
    }
    const out: InboundMessage[] = [];
    for (const entry of parsed.data.entry) {
      for (const event of entry.messaging) {
        const msg = event.message;
        // echoes are our own outbound messages
        if (!msg?.text || msg.is_echo) continue;
        out.push(toInbound('instagram', event.sender.id, msg.text, msg.mid, epochToIso(event.timestamp, receivedAt)));
      }
    }
    return out;
  }

  async sendOutbound(recipientId: string, text: string): Promise<void> {
    await this.options.send({
      recipient: { id: recipientId },
      messaging_type: 'RESPONSE',
      message: { text },
    });
  }
}
