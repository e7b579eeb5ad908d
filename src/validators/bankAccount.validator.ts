import { z } from 'zod';

/**
 * Digits and checksum are checked by the service
 */
export const bankAccountSchema = z.object({
  routingNumber: z.string({ required_error: "can't be blank" }),
  accountNumber: z.string({ required_error: "can't be blank" }),
});
