import axios, { type AxiosInstance } from 'axios';

import { config } from '@config/env.config.js';

export interface TikTokTextPayload {
  user_id: string;
  message: string;
}

let instance: AxiosInstance | null = null;

export function isTikTokSendConfigured(): boolean {
  return Boolean(config.TIKTOK_SEND_URL && config.TIKTOK_ACCESS_TOKEN);
}

function createInstance(): AxiosInstance {
  if (!config.TIKTOK_SEND_URL || !config.TIKTOK_ACCESS_TOKEN) {
    throw new Error('TikTok environment configuration is incomplete');
  }
  return axios.create({
    baseURL: config.TIKTOK_SEND_URL,
    headers: {
      Authorization: `Bearer ${config.TIKTOK_ACCESS_TOKEN}`,
      'Content-Type': 'application/json',
    },
    timeout: 10000,
    validateStatus: (s) => s < 500,
  });
}

export async function sendTikTokMessage(payload: TikTokTextPayload): Promise<void> {
  instance ??= createInstance();
  const res = await instance.post('', payload);
  if (res.status >= 400) {
    throw new Error(`TikTok send failed with status ${res.status}`);
  }
}
