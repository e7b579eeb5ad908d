import { INotifier } from '@/interfaces/INotifier';
import { env } from '@/config/env';
import { ResendNotifier } from './ResendNotifier';
import { LogNotifier } from './LogNotifier';

/**
 * Resend when an API key is configured, log-only otherwise
 */
export function createNotifier(): INotifier {
  if (env.RESEND_API_KEY) {
    return new ResendNotifier(env.RESEND_API_KEY, env.EMAIL_FROM);
  }
  return new LogNotifier();
}
