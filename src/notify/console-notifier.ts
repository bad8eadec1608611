import type { Notifier } from '../core/types.js';

/**
 * Development notifier: logs instead of sending mail.
 *
 * The secret itself is printed only when NODE_ENV is 'development'.
 */
export class ConsoleNotifier implements Notifier {
  async sendActivationSecret(email: string, secret: string): Promise<void> {
    if (process.env.NODE_ENV === 'development') {
      console.log(`[ConsoleNotifier] Activation secret for ${email}: ${secret}`);
    } else {
      console.log(`[ConsoleNotifier] Activation secret issued for ${email}`);
    }
  }
}
