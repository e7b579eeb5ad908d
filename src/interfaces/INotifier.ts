/**
 * Outbound email abstraction
 */

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  html: string;
}

export interface INotifier {
  /**
   * Deliver a message. Resolves false when delivery failed; never rejects.
   */
  send(message: EmailMessage): Promise<boolean>;
}
