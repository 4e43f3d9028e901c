export const PLATFORMS = ['whatsapp', 'instagram', 'tiktok'] as const;
export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((p) => p === value);
}

export type Locale = 'ar' | 'en';

/** Normalized inbound message; frozen once an adapter has produced it. */
export interface InboundMessage {
  readonly platform: Platform;
  readonly senderId: string;
  readonly text: string;
  readonly platformMessageId: string;
  readonly receivedAt: string;
}

export interface OutboundMessage {
  platform: Platform;
  recipientId: string;
  text: string;
}
