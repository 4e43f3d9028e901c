import crypto from 'crypto';
import type { IncomingHttpHeaders } from 'http';

import type { InboundMessage, Platform } from '@core/interfaces/message.types.js';

export type WebhookQuery = Record<string, unknown>;

/** Edge between a messaging platform's webhook format and the pipeline. */
export interface PlatformAdapter {
  readonly platform: Platform;
  /** Returns the challenge to echo back, or `null` to refuse the subscription. */
  verifyChallenge(query: WebhookQuery): string | null;
  verifySignature(rawBody: Buffer, headers: IncomingHttpHeaders): boolean;
  /** Text messages only; anything else in the payload is ignored. */
  parseInbound(body: unknown, receivedAt: string): InboundMessage[];
  sendOutbound(recipientId: string, text: string): Promise<void>;
}

export interface AdapterOptions<P> {
  verifyToken?: string;
  appSecret?: string;
  /** When true, a missing secret rejects every request instead of skipping the check. */
  requireSignature: boolean;
  send: (payload: P) => Promise<void>;
}

export type AdapterRegistry = ReadonlyMap<Platform, PlatformAdapter>;

export function createRegistry(adapters: PlatformAdapter[]): AdapterRegistry {
  return new Map(adapters.map((a) => [a.platform, a]));
}

export function verifyHubChallenge(query: WebhookQuery, verifyToken: string | undefined): string | null {
  const mode = query['hub.mode'];
  const token = query['hub.verify_token'];
  const challenge = query['hub.challenge'];
  if (!verifyToken || mode !== 'subscribe' || token !== verifyToken) return null;
  return typeof challenge === 'string' ? challenge : null;
}

export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** `sha256=<hex>` HMAC of the raw body, compared in constant time. */
export function verifyHmacSignature(
  rawBody: Buffer,
  signature: string | undefined,
  secret: string | undefined,
  requireSignature: boolean,
  prefix = 'sha256=',
): boolean {
  if (!secret) return !requireSignature;
  if (!signature) return false;
  const expected = prefix + crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
  const a = Buffer.from(signature);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function toInbound(
  platform: Platform,
  senderId: string,
  text: string,
  platformMessageId: string,
  receivedAt: string,
): InboundMessage {
  return Object.freeze({ platform, senderId, text, platformMessageId, receivedAt });
}

export function epochToIso(seconds: string | number | undefined, fallback: string): string {
  const n = Number(seconds);
  return Number.isFinite(n) && n > 0 ? new Date(n * (n < 1e12 ? 1000 : 1)).toISOString() : fallback;
}
