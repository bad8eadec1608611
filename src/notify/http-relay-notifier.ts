/**
 * HTTP Relay Notifier
 *
 * Hands activation mail to an HTTP mail relay as JSON:
 *   POST {relayUrl}  { to, subject, text }
 * Any non-2xx answer or network failure is a DeliveryError; no retries.
 */

import type { Notifier } from '../core/types.js';
import { DeliveryError } from '../utils/errors.js';

export interface HttpRelayNotifierConfig {
  relayUrl: string;
  /** Sent as `Authorization: Bearer <apiKey>` when set */
  apiKey?: string;
  subject?: string;
  /** Default: 5000 */
  timeoutMs?: number;
}

export const DEFAULT_ACTIVATION_SUBJECT = 'Complete your registration';

export class HttpRelayNotifier implements Notifier {
  private readonly config: HttpRelayNotifierConfig;

  constructor(config: HttpRelayNotifierConfig) {
    this.config = config;
  }

  async sendActivationSecret(email: string, secret: string): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(this.config.relayUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          to: email,
          subject: this.config.subject ?? DEFAULT_ACTIVATION_SUBJECT,
          text: `Your activation code is ${secret}.`,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? 5000),
      });
    } catch (error) {
      throw new DeliveryError('Mail relay request failed', {
        originalError: error instanceof Error ? error.message : String(error),
      });
    }

    console.log('[HttpRelayNotifier] Relay response status:', response.status);

    if (!response.ok) {
      throw new DeliveryError(`Mail relay rejected the message: HTTP ${response.status}`, {
        httpStatus: response.status,
      });
    }
  }
}
