import { INotifier } from '@/interfaces/INotifier';
import { User, ExpenseReport } from '@/models';
import { ExpenseReportStatus } from '@/constants/expenseReports';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import {
  EmailContent,
  applicationApprovedEmail,
  applicationRejectedEmail,
  membershipPlanChangedEmail,
  expenseReportSubmittedEmail,
  expenseReportStatusEmail,
} from './notification.templates';

const logger = createLogger('NotificationService');

type Recipient = Pick<User, 'id' | 'email' | 'firstName'>;

/**
 * Notification Service
 * Member-facing emails. Delivery problems are logged, never thrown.
 */
export class NotificationService {
  constructor(private notifier: INotifier) {}

  async applicationReviewed(user: Recipient, approved: boolean): Promise<boolean> {
    const content = approved
      ? applicationApprovedEmail(user.firstName)
      : applicationRejectedEmail(user.firstName);
    return this.deliver(user, content);
  }

  async membershipPlanChanged(user: Recipient, fromPlan: string, toPlan: string): Promise<boolean> {
    return this.deliver(user, membershipPlanChangedEmail(user.firstName, fromPlan, toPlan));
  }

  async expenseReportSubmitted(
    user: Recipient,
    report: Pick<ExpenseReport, 'purpose'>,
    netTotal: string
  ): Promise<boolean> {
    return this.deliver(user, expenseReportSubmittedEmail(user.firstName, report.purpose, netTotal));
  }

  async expenseReportStatusChanged(
    user: Recipient,
    report: Pick<ExpenseReport, 'purpose'>,
    status: ExpenseReportStatus,
    note: string | null
  ): Promise<boolean> {
    return this.deliver(
      user,
      expenseReportStatusEmail(user.firstName, report.purpose, status, note)
    );
  }

  private async deliver(user: Recipient, content: EmailContent): Promise<boolean> {
    try {
      const sent = await this.notifier.send({ to: user.email, ...content });
      if (!sent) {
        logger.warn({ userId: user.id, subject: content.subject }, 'Notification not delivered');
      }
      return sent;
    } catch (error) {
      logger.error({ error, userId: user.id, subject: content.subject }, 'Notification failed');
      return false;
    }
  }
}
