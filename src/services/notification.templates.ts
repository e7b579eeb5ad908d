import { EmailMessage } from '@/interfaces/INotifier';
import { ExpenseReportStatus } from '@/constants/expenseReports';

export type EmailContent = Omit<EmailMessage, 'to'>;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function greeting(firstName: string | null): string {
  return firstName ? `Hi ${firstName},` : 'Hi,';
}

function layout(paragraphs: string[]): { text: string; html: string } {
  return {
    text: paragraphs.join('\n\n'),
    html: paragraphs.map((paragraph) => `<p>${escapeHtml(paragraph)}</p>`).join('\n'),
  };
}

export function applicationApprovedEmail(firstName: string | null): EmailContent {
  return {
    subject: 'Your membership application was approved',
    ...layout([
      greeting(firstName),
      'Your membership application has been approved. Welcome, you are now a member!',
    ]),
  };
}

export function applicationRejectedEmail(firstName: string | null): EmailContent {
  return {
    subject: 'Your membership application',
    ...layout([
      greeting(firstName),
      'Unfortunately your membership application was not approved. Reply to this email if you have any questions.',
    ]),
  };
}

export function membershipPlanChangedEmail(
  firstName: string | null,
  fromPlan: string,
  toPlan: string
): EmailContent {
  return {
    subject: 'Your membership plan was changed',
    ...layout([
      greeting(firstName),
      `Your membership plan was changed from ${fromPlan} to ${toPlan}.`,
    ]),
  };
}

export function expenseReportSubmittedEmail(
  firstName: string | null,
  purpose: string,
  netTotal: string
): EmailContent {
  return {
    subject: 'Expense report submitted',
    ...layout([
      greeting(firstName),
      `We received your expense report "${purpose}" for $${netTotal}. The treasurer will review it shortly.`,
    ]),
  };
}

const STATUS_SENTENCES: Partial<Record<ExpenseReportStatus, string>> = {
  approved: 'has been approved and will be reimbursed soon.',
  rejected: 'was rejected.',
  paid: 'has been paid.',
};

export function expenseReportStatusEmail(
  firstName: string | null,
  purpose: string,
  status: ExpenseReportStatus,
  note: string | null
): EmailContent {
  const sentence = STATUS_SENTENCES[status] ?? `is now ${status}.`;
  const paragraphs = [greeting(firstName), `Your expense report "${purpose}" ${sentence}`];
  if (note) {
    paragraphs.push(`Note from the reviewer: ${note}`);
  }

  return {
    subject: `Expense report ${status}`,
    ...layout(paragraphs),
  };
}
