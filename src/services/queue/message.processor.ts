import type { InboundMessage } from '@core/interfaces/message.types.js';

import type { AdapterRegistry } from '@services/messaging/platform.adapter.js';
import { detectLocale, message } from '@services/formatter/templates.js';
import type { MessagePipeline, PipelineOutcome } from '@services/pipeline/message.pipeline.js';

import { config } from '@config/env.config.js';

import { logger } from '@utils/logger.js';

export interface ProcessOptions {
  /** On the last attempt a failure is answered with an apology instead of rethrown. */
  finalAttempt: boolean;
}

/** Runs the pipeline for one queued message and delivers whatever it produced. */
export class MessageProcessor {
  constructor(
    private readonly pipeline: MessagePipeline,
    private readonly adapters: AdapterRegistry,
  ) {}

  async process(msg: InboundMessage, options: ProcessOptions): Promise<PipelineOutcome | null> {
    let outcome: PipelineOutcome;
    try {
      outcome = await this.pipeline.handle(msg);
    } catch (err) {
      if (!options.finalAttempt) throw err;
      logger.error('[processor] giving up on message', {
        platform: msg.platform,
        messageId: msg.platformMessageId,
        err,
      });
      await this.deliver(msg, message('escalate_fallback', detectLocale(msg.text, config.DEFAULT_LOCALE)));
      return null;
    }

    switch (outcome.kind) {
      case 'duplicate':
        break;
      case 'rate_limited':
        if (outcome.text) await this.deliver(msg, outcome.text);
        break;
      case 'reply':
      case 'failure':
        await this.deliver(msg, outcome.text);
        break;
    }
    return outcome;
  }

  private async deliver(msg: InboundMessage, text: string): Promise<void> {
    const adapter = this.adapters.get(msg.platform);
    if (!adapter) {
      logger.warn('[processor] no adapter for platform', { platform: msg.platform });
      return;
    }
    await adapter.sendOutbound(msg.senderId, text);
  }
}
