import { INotifier, EmailMessage } from '@/interfaces/INotifier';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('LogNotifier');

/**
 * Notifier used when RESEND_API_KEY is not configured
 * Writes the message to the log instead of sending it.
 */
export class LogNotifier implements INotifier {
  async send(message: EmailMessage): Promise<boolean> {
    logger.info(
      { to: message.to, subject: message.subject, text: message.text },
      'Email not sent (RESEND_API_KEY not configured)'
    );
    return true;
  }
}
