import type { IncomingHttpHeaders } from 'http';

import { z } from 'zod';

import type { InboundMessage } from '@core/interfaces/message.types.js';
import type { WhatsAppTextPayload } from '@infra/whatsapp/whatsapp.client.js';

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

const WhatsAppWebhook = z.object({
  entry: z
    .array(
      z.object({
        changes: z
          .array(
            z.object({
              value: z
                .object({
                  messages: z
                    .array(
                      z.object({
                        id: z.string(),
                        from: z.string(),
                        type: z.string(),
                        timestamp: z.string().optional(),
                        text: z.object({ body: z.string() }).optional(),
                      }),
                    )
                    .default([]),
                })
                .optional(),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

export class WhatsAppAdapter implements PlatformAdapter {
  readonly platform = 'whatsapp' as const;

  constructor(private readonly options: AdapterOptions<WhatsAppTextPayload>) {}

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
    const parsed = WhatsAppWebhook.safeParse(body);
    if (!parsed.success) {
      logger.warn('[whatsapp] unrecognised webhook payload', { issues: parsed.error.issues.length });
      return [];
    }
    const out: InboundMessage[] = [];
    for (const entry of parsed.data.entry) {
      for (const change of entry.changes) {
        for (const msg of change.value?.messages ?? []) {
          if (msg.type !== 'text' || !msg.text) continue;
          out.push(toInbound('whatsapp', msg.from, msg.text.body, msg.id, epochToIso(msg.timestamp, receivedAt)));
        }
      }
    }
    return out;
  }

  async sendOutbound(recipientId: string, text: string): Promise<void> {
    await this.options.send({
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: recipientId,
      type: 'text',
      text: { body: text, preview_url: false },
    });
  }
}
