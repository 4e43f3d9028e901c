import axios, { type AxiosInstance } from 'axios';

import { config } from '@config/env.config.js';

export interface InstagramTextPayload {
  recipient: { id: string };
  messaging_type: 'RESPONSE';
  message: { text: string };
}

let instance: AxiosInstance | null = null;

function createInstance(): AxiosInstance {
  if (!config.INSTAGRAM_ACCESS_TOKEN) {
    throw new Error('Instagram environment configuration is incomplete');
  }
  return axios.create({
    baseURL: 'https://graph.facebook.com/v19.0/me',
    headers: {
      Authorization: `Bearer ${config.INSTAGRAM_ACCESS_TOKEN}`,
      'Content-Type': 'application/json',
    },
    timeout: 10000,
    validateStatus: (s) => s < 500,
  });
}

export async function sendInstagramMessage(payload: InstagramTextPayload): Promise<void> {
  instance ??= createInstance();
  const res = await instance.post('/messages', payload);
  if (res.status >= 400) {
    throw new Error(`Instagram send failed with status ${res.status}`);
  }
}
