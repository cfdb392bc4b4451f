/**
 * Email Service
 * Sends transactional email through the Resend API. Without an API key the
 * message is logged instead of sent.
 */

import axios, { type AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';

const RESEND_API_URL = 'https://api.resend.com/emails';

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
  text: string;
  replyTo?: string;
}

export type EmailSendResult =
  | { status: 'delivered'; id: string }
  | { status: 'simulated' }
  | { status: 'error'; error: string };

export interface EmailServiceOptions {
  apiKey: string;
  fromAddress: string;
  fromName: string;
  client?: AxiosInstance;
}

function describeAxiosError(error: unknown): string | null {
  if (!axios.isAxiosError(error)) {
    return null;
  }
  const data: unknown = error.response?.data;
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return error.message;
}

export class EmailService {
  private readonly client: AxiosInstance;

  constructor(private readonly options: EmailServiceOptions) {
    if (!options.apiKey) {
      functions.logger.warn('[email] RESEND_API_KEY not configured. Emails will be logged, not sent.');
    }

    this.client =
      options.client ??
      axios.create({
        baseURL: RESEND_API_URL,
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
        },
        timeout: 10000,
      });
  }

  get isConfigured(): boolean {
    return this.options.apiKey.length > 0;
  }

  async send(message: EmailMessage): Promise<EmailSendResult> {
    if (!this.isConfigured) {
      functions.logger.info(`[email] Simulated email to ${message.to}`, {
        subject: message.subject,
      });
      return { status: 'simulated' };
    }

    try {
      const response = await this.client.post<{ id: string }>('', {
        from: `${this.options.fromName} <${this.options.fromAddress}>`,
        to: [message.to],
        subject: message.subject,
        html: message.html,
        text: message.text,
        ...(message.replyTo ? { reply_to: message.replyTo } : {}),
      });

      functions.logger.info(`[email] Sent "${message.subject}" to ${message.to}`, {
        emailId: response.data.id,
      });
      return { status: 'delivered', id: response.data.id };
    } catch (error) {
      const description = describeAxiosError(error);
      if (description === null) {
        throw error;
      }
      functions.logger.error(`[email] Error sending to ${message.to}:`, {
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
        message: description,
      });
      return { status: 'error', error: description };
    }
  }
}
