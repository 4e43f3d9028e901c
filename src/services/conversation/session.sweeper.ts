import type { BookingSession } from '@core/interfaces/booking.types.js';
import type { Locale } from '@core/interfaces/message.types.js';

import type { BookingFlowService } from '@services/booking/booking.flow.js';
import { formatTimeoutNotice } from '@services/formatter/formatter.js';

import type { KeyedLock } from '@utils/locks.js';
import { logger } from '@utils/logger.js';

import type { SessionStore } from './session.store.js';

export type TimeoutNotifier = (session: BookingSession, text: string) => Promise<void>;

/** Periodically closes booking sessions that went idle, so the user hears about it. */
export class SessionSweeper {
  private timer: NodeJS.Timeout | undefined;
  private running = false;

  constructor(
    private readonly sessions: SessionStore,
    private readonly booking: BookingFlowService,
    private readonly lock: KeyedLock,
    private readonly notify: TimeoutNotifier,
    private readonly locale: Locale,
  ) {}

  /** Returns how many sessions were closed. */
  async sweep(): Promise<number> {
    if (this.running) return 0;
    this.running = true;
    let closed = 0;
    try {
      for await (const candidate of this.sessions.listOpen()) {
        if (!this.booking.isStale(candidate)) continue;
        try {
          if (await this.expire(candidate)) closed++;
        } catch (err) {
          logger.error('[sweeper] failed to expire session', { sessionId: candidate.id, err });
        }
      }
    } finally {
      this.running = false;
    }
    if (closed) logger.info('[sweeper] sessions expired', { closed });
    return closed;
  }

  private async expire(candidate: BookingSession): Promise<boolean> {
    const { platform, userId } = candidate;
    const result = await this.lock.withLock(`${platform}:${userId}`, async () => {
      // re-read under the lock: the user may have answered meanwhile
      const current = await this.sessions.get(platform, userId);
      return this.booking.expireIfStale(current);
    });
    if (!result || result.failure) return false;
    await this.notify(result.session, formatTimeoutNotice(this.locale));
    return true;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        logger.error('[sweeper] scan failed', { err });
      });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}
