import { Resend } from 'resend';
import { INotifier, EmailMessage } from '@/interfaces/INotifier';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('ResendNotifier');

/**
 * Email delivery through Resend
 * Logs failures and resolves false; callers never fail because of email.
 */
export class ResendNotifier implements INotifier {
  private readonly resend: Resend;

  constructor(apiKey: string, private readonly from: string) {
    this.resend = new Resend(apiKey);
  }

  async send(message: EmailMessage): Promise<boolean> {
    try {
      const { data, error } = await this.resend.emails.send({
        from: this.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });

      if (error) {
        logger.warn({ to: message.to, subject: message.subject, error }, 'Email rejected by Resend');
        return false;
      }

      logger.info({ to: message.to, subject: message.subject, id: data?.id }, 'Email sent');
      return true;
    } catch (error) {
      logger.error({ to: message.to, subject: message.subject, error }, 'Email delivery failed');
      return false;
    }
  }
}
