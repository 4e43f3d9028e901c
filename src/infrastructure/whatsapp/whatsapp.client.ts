import axios, { type AxiosInstance } from 'axios';

import { config } from '@config/env.config.js';

export interface WhatsAppTextPayload {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
  type: 'text';
  text: { body: string; preview_url: boolean };
}

let instance: AxiosInstance | null = null;

function createInstance(): AxiosInstance {
  const { WHATSAPP_PHONE_NUMBER_ID, WHATSAPP_ACCESS_TOKEN } = config;
  if (!WHATSAPP_PHONE_NUMBER_ID || !WHATSAPP_ACCESS_TOKEN) {
    throw new Error('WhatsApp environment configuration is incomplete');
  }
  return axios.create({
    baseURL: `https://graph.facebook.com/v19.0/${WHATSAPP_PHONE_NUMBER_ID}`,
    headers: {
      Authorization: `Bearer ${WHATSAPP_ACCESS_TOKEN}`,
      'Content-Type': 'application/json',
    },
    timeout: 10000,
    validateStatus: (s) => s < 500,
  });
}

function getAxios(): AxiosInstance {
  if (!instance) {
    instance = createInstance();
  }
  return instance;
}

export async function sendWhatsAppMessage(payload: WhatsAppTextPayload): Promise<void> {
  const res = await getAxios().post('/messages', payload);
  if (res.status >= 400) {
    throw new Error(`WhatsApp send failed with status ${res.status}`);
  }
}

export { getAxios as getWhatsAppAxios };
