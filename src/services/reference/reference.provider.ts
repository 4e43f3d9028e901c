import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';

import { ReferenceDataUnavailableError } from '@core/errors/reference-data.error.js';

import { logger } from '@utils/logger.js';

import { buildSnapshot } from './reference.snapshot.js';
import type { ReferenceSource } from './reference.source.js';

/**
 * Owns the current reference snapshot. A refresh builds a new frozen snapshot and
 * swaps the reference; readers holding the old one keep a consistent view.
 */
export class ReferenceProvider {
  private snapshot: ReferenceSnapshot | null = null;
  private inflight: Promise<ReferenceSnapshot> | null = null;
  private timer: NodeJS.Timeout | undefined;
  private version = 0;

  constructor(private readonly source: ReferenceSource) {}

  peek(): ReferenceSnapshot | null {
    return this.snapshot;
  }

  /** Current snapshot, loading it first when the provider is cold. */
  async current(): Promise<ReferenceSnapshot> {
    if (this.snapshot) return this.snapshot;
    return this.refresh();
  }

  async refresh(): Promise<ReferenceSnapshot> {
    if (this.inflight) return this.inflight;
    this.inflight = this.load().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async load(): Promise<ReferenceSnapshot> {
    try {
      const data = await this.source.load();
      this.version += 1;
      const next = buildSnapshot(data, this.version);
      this.snapshot = next;
      logger.info('[reference] snapshot loaded', {
        version: next.version,
        doctors: next.doctors.size,
        branches: next.branches.size,
        services: next.services.size,
        availability: next.availability.size,
      });
      return next;
    } catch (err) {
      if (this.snapshot) {
        logger.warn('[reference] refresh failed, keeping previous snapshot', {
          version: this.snapshot.version,
          err,
        });
        return this.snapshot;
      }
      if (err instanceof ReferenceDataUnavailableError) throw err;
      throw new ReferenceDataUnavailableError(err instanceof Error ? err.message : String(err));
    }
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.refresh().catch((err: unknown) => {
        logger.error('[reference] scheduled refresh failed', { err });
      });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}
