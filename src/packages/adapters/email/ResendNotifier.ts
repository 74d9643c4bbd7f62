/**
 * ResendNotifier - Passcode delivery through the Resend HTTP API
 * https://resend.com/docs/api-reference/emails/send-email
 *
 * @module packages/adapters/email/ResendNotifier
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { INotifier } from '../../core/ports/INotifier.js';
import { NotifierError } from '../../../utils/errors.js';
import { maskEmail } from '../../../utils/email.js';
import { logger } from '../../../utils/logger.js';

const RESEND_BASE_URL = 'https://api.resend.com';

const sendResponseSchema = z.object({ id: z.string() });

export type HttpPoster = Pick<AxiosInstance, 'post'>;

export interface ResendNotifierOptions {
  apiKey?: string;
  from: string;
  /** Shown in the message body */
  ttlMinutes: number;
  /** Injected for tests; defaults to an axios instance bound to Resend */
  client?: HttpPoster;
}

export class ResendNotifier implements INotifier {
  private readonly client: HttpPoster | null;
  private readonly from: string;
  private readonly ttlMinutes: number;

  constructor(options: ResendNotifierOptions) {
    this.from = options.from;
    this.ttlMinutes = options.ttlMinutes;
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = axios.create({
        baseURL: RESEND_BASE_URL,
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
        },
        timeout: 15000,
      });
    } else {
      this.client = null;
    }
  }

  async sendPasscode(email: string, code: string): Promise<boolean> {
    if (!this.client) {
      logger.error('RESEND_API_KEY not set; cannot deliver passcode');
      return false;
    }

    try {
      const response = await this.client.post('/emails', {
        from: this.from,
        to: [email],
        subject: `Your verification code: ${code}`,
        text: this.renderText(code),
        html: this.renderHtml(code),
      });

      const parsed = sendResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        logger.warn({ email: maskEmail(email) }, 'Email provider returned an unexpected body');
        return false;
      }

      logger.info({ email: maskEmail(email), messageId: parsed.data.id }, 'Passcode email sent');
      return true;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status;
        logger.error({ email: maskEmail(email), status }, 'Email provider rejected passcode email');
        throw new NotifierError(`Email provider error${status ? `: ${status}` : ''}`, status);
      }
      throw err;
    }
  }

  private renderText(code: string): string {
    return [
      `Your verification code is ${code}.`,
      `It expires in ${this.ttlMinutes} minutes.`,
      'Enter it in the Telegram chat to share your credits between the bot and the web app.',
    ].join('\n');
  }

  private renderHtml(code: string): string {
    return `
      <div style="font-family: Arial, sans-serif; max-width: 420px; margin: 0 auto; padding: 16px;">
        <p>Your verification code is:</p>
        <p style="font-size: 28px; font-weight: bold; letter-spacing: 6px;">${code}</p>
        <p style="color: #555; font-size: 13px;">It expires in ${this.ttlMinutes} minutes.</p>
      </div>
    `;
  }
}

/**
 * Factory function
 */
export function createResendNotifier(options: ResendNotifierOptions): ResendNotifier {
  return new ResendNotifier(options);
}
