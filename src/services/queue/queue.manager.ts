import { Queue, Worker, type Job } from 'bullmq';

import type { InboundMessage } from '@core/interfaces/message.types.js';
import { bullConnectionFromUrl } from '@infra/redis/redis.config.js';

import { logger } from '@utils/logger.js';

import type { MessageProcessor } from './message.processor.js';

export const QUEUE_NAME = 'messages';

export interface MessageQueue {
  enqueue(msg: InboundMessage): Promise<void>;
  close(): Promise<void>;
}

export interface BullQueueOptions {
  redisUrl: string;
  concurrency: number;
  maxAttempts: number;
}

/** BullMQ job ids may not contain ':'. */
export function jobIdFor(msg: InboundMessage): string {
  return `${msg.platform}-${msg.platformMessageId}`.replace(/:/g, '_');
}

export class BullMessageQueue implements MessageQueue {
  private readonly queue: Queue<InboundMessage>;
  private readonly worker: Worker<InboundMessage>;

  constructor(
    processor: MessageProcessor,
    private readonly options: BullQueueOptions,
  ) {
    const connection = bullConnectionFromUrl(options.redisUrl);
    this.queue = new Queue<InboundMessage>(QUEUE_NAME, { connection });
    this.worker = new Worker<InboundMessage>(
      QUEUE_NAME,
      async (job: Job<InboundMessage>) => {
        const attempts = job.opts.attempts ?? 1;
        await processor.process(job.data, { finalAttempt: job.attemptsMade + 1 >= attempts });
      },
      { connection, concurrency: options.concurrency },
    );
    this.worker.on('failed', (job, err) => {
      logger.warn('[queue] job failed', { jobId: job?.id, attemptsMade: job?.attemptsMade, err });
    });
    this.worker.on('error', (err) => {
      logger.error('[queue] worker error', { err });
    });
  }

  async enqueue(msg: InboundMessage): Promise<void> {
    await this.queue.add('message', msg, {
      jobId: jobIdFor(msg),
      removeOnComplete: true,
      removeOnFail: 50,
      attempts: this.options.maxAttempts,
      backoff: { type: 'fixed', delay: 2000 },
    });
  }

  async close(): Promise<void> {
    await this.worker.close();
    await this.queue.close();
  }
}

/** Runs each message in process right away; used with the memory store driver. */
export class InlineMessageQueue implements MessageQueue {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly processor: MessageProcessor) {}

  async enqueue(msg: InboundMessage): Promise<void> {
    const task = this.processor
      .process(msg, { finalAttempt: true })
      .then(() => undefined)
      .catch((err: unknown) => {
        logger.error('[queue] inline processing failed', { messageId: msg.platformMessageId, err });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /** Resolves once every accepted message has been processed. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async close(): Promise<void> {
    await this.drain();
  }
}
