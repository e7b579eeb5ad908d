import { z } from 'zod';
import { LEDGER_LIMITS } from '@/config/businessRules';
import { ENTITY_TYPES, BOOKING_PROPERTIES } from '@/constants/ledger';
import { parseMoney, toMoneyString } from '@/utils/money';

/**
 * Money amount as operators type it ("25", "25.50", "$1,200")
 * Output is a 2-decimal string.
 */
export const moneyAmountSchema = z.unknown().transform((value, ctx): string => {
  if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "can't be blank" });
    return z.NEVER;
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid amount format' });
    return z.NEVER;
  }

  const parsed = parseMoney(value);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  if (!parsed.value.gt(0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be positive' });
    return z.NEVER;
  }
  if (parsed.value.gt(LEDGER_LIMITS.MAX_AMOUNT)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be at most ${LEDGER_LIMITS.MAX_AMOUNT}`,
    });
    return z.NEVER;
  }

  return toMoneyString(parsed.value);
});

const reasonSchema = z
  .string({ required_error: "can't be blank", invalid_type_error: "can't be blank" })
  .trim()
  .min(1, { message: "can't be blank" })
  .max(LEDGER_LIMITS.MAX_REASON_LENGTH, {
    message: `should be at most ${LEDGER_LIMITS.MAX_REASON_LENGTH} character(s)`,
  });

export const dateRangeQuerySchema = z.object({
  startDate: z.string().trim().optional(),
  endDate: z.string().trim().optional(),
});

export const recentPaymentsQuerySchema = dateRangeQuerySchema.extend({
  limit: z.coerce.number().int().min(1).optional(),
});

export const recordPaymentSchema = z.object({
  userId: z.string().min(1),
  amount: moneyAmountSchema,
  entityType: z.string().trim().min(1),
  entityId: z.string().nullish(),
  externalPaymentId: z.string().trim().min(1),
  stripeFee: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value, ctx) => {
      if (value === null || value === undefined || value === '') return null;
      const parsed = parseMoney(value);
      if (!parsed.ok || parsed.value.isNegative()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid amount format' });
        return z.NEVER;
      }
      return toMoneyString(parsed.value);
    }),
  description: z.string().trim().min(1, { message: "can't be blank" }),
  property: z.enum([BOOKING_PROPERTIES.TAHOE, BOOKING_PROPERTIES.CLEAR_LAKE]).nullish(),
});

export const recordPayoutSchema = z.object({
  amount: moneyAmountSchema,
  stripePayoutId: z.string().trim().min(1),
  description: z.string().trim().min(1, { message: "can't be blank" }),
});

export const refundSchema = z.object({
  paymentId: z.string({ required_error: "can't be blank" }).min(1, { message: "can't be blank" }),
  amount: moneyAmountSchema,
  reason: reasonSchema,
});

export const creditSchema = z.object({
  userId: z.string({ required_error: "can't be blank" }).min(1, { message: "can't be blank" }),
  amount: moneyAmountSchema,
  reason: reasonSchema,
  entityType: z
    .enum([
      ENTITY_TYPES.ADMINISTRATION,
      ENTITY_TYPES.EVENT,
      ENTITY_TYPES.MEMBERSHIP,
      ENTITY_TYPES.BOOKING,
      ENTITY_TYPES.DONATION,
    ])
    .default(ENTITY_TYPES.ADMINISTRATION),
  entityId: z.string().nullish(),
});

export type RefundDTO = z.infer<typeof refundSchema>;
export type CreditDTO = z.infer<typeof creditSchema>;
