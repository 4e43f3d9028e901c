import { vi } from 'vitest';

import type { LlmCapability, LlmClassification, LlmResult } from '@core/interfaces/llm.types.js';

/** LLM stand-in that reports itself unconfigured until a test says otherwise. */
export function fakeLlm() {
  const classify = vi.fn<LlmCapability['classify']>(
    async (): Promise<LlmResult<LlmClassification>> => ({
      ok: false,
      failure: { kind: 'not_configured', message: 'OpenAI is not configured' },
    }),
  );
  const generate = vi.fn<LlmCapability['generate']>(
    async (): Promise<LlmResult<string>> => ({
      ok: false,
      failure: { kind: 'not_configured', message: 'OpenAI is not configured' },
    }),
  );
  return { classify, generate };
}
