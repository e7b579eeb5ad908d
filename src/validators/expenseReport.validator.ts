import { z } from 'zod';
import { EXPENSE_RULES } from '@/config/businessRules';
import {
  EXPENSE_REPORT_STATUSES,
  REIMBURSEMENT_METHODS,
} from '@/constants/expenseReports';
import { isoDateSchema } from './common';
import { moneyAmountSchema } from './money.validator';

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

const expenseItemSchema = z.object({
  date: isoDateSchema,
  vendor: z
    .string({ required_error: "can't be blank" })
    .trim()
    .min(1, { message: "can't be blank" }),
  description: optionalText,
  amount: moneyAmountSchema,
  receiptS3Path: optionalText,
});

const incomeItemSchema = z.object({
  date: isoDateSchema,
  description: z
    .string({ required_error: "can't be blank" })
    .trim()
    .min(1, { message: "can't be blank" }),
  amount: moneyAmountSchema,
  proofS3Path: optionalText,
});

/**
 * Shape of a report; submission rules (receipts, certification, payout
 * details) are checked by the service
 */
export const expenseReportSchema = z.object({
  purpose: z
    .string({ required_error: "can't be blank" })
    .trim()
    .min(1, { message: "can't be blank" })
    .max(EXPENSE_RULES.MAX_PURPOSE_LENGTH, {
      message: `should be at most ${EXPENSE_RULES.MAX_PURPOSE_LENGTH} character(s)`,
    }),
  eventId: optionalText,
  reimbursementMethod: z.enum([REIMBURSEMENT_METHODS.CHECK, REIMBURSEMENT_METHODS.BANK_TRANSFER], {
    required_error: "can't be blank",
  }),
  addressId: optionalText,
  bankAccountId: optionalText,
  certificationAccepted: z.boolean().default(false),
  status: z
    .enum([EXPENSE_REPORT_STATUSES.DRAFT, EXPENSE_REPORT_STATUSES.SUBMITTED])
    .default(EXPENSE_REPORT_STATUSES.SUBMITTED),
  expenseItems: z.array(expenseItemSchema).max(EXPENSE_RULES.MAX_ITEMS).default([]),
  incomeItems: z.array(incomeItemSchema).max(EXPENSE_RULES.MAX_ITEMS).default([]),
});

export const reviewQuerySchema = z.object({
  status: z
    .enum([
      EXPENSE_REPORT_STATUSES.DRAFT,
      EXPENSE_REPORT_STATUSES.SUBMITTED,
      EXPENSE_REPORT_STATUSES.APPROVED,
      EXPENSE_REPORT_STATUSES.REJECTED,
      EXPENSE_REPORT_STATUSES.PAID,
    ])
    .optional(),
});

export const statusChangeSchema = z.object({
  status: z.enum([
    EXPENSE_REPORT_STATUSES.DRAFT,
    EXPENSE_REPORT_STATUSES.SUBMITTED,
    EXPENSE_REPORT_STATUSES.APPROVED,
    EXPENSE_REPORT_STATUSES.REJECTED,
    EXPENSE_REPORT_STATUSES.PAID,
  ]),
  note: z.string().trim().max(1000).nullish(),
});

export type ExpenseReportDTO = z.infer<typeof expenseReportSchema>;
