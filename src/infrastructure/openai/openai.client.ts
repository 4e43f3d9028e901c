import OpenAI from 'openai';

import { config } from '@config/env.config.js';

let client: OpenAI | null = null;

export function isOpenAIConfigured(): boolean {
  return Boolean(config.OPENAI_API_KEY);
}

export function getOpenAI(): OpenAI {
  if (!config.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY is not configured');
  }
  if (!client) {
    // retries are handled by withRetry inside the request deadline
    client = new OpenAI({ apiKey: config.OPENAI_API_KEY, maxRetries: 0, timeout: config.OPENAI_TIMEOUT_MS });
  }
  return client;
}
