import { z } from 'zod';
import { DEALER_ID_MAX, DEALER_ID_MIN } from '../types';

const DEALER_ID_MESSAGE = 'DealerId must be a four-digit number.';

export const dealerIdSchema = z
  .union([z.string().trim().regex(/^\d+$/, DEALER_ID_MESSAGE), z.number()], {
    errorMap: () => ({ message: DEALER_ID_MESSAGE }),
  })
  .transform(Number)
  .pipe(z.number().int(DEALER_ID_MESSAGE).min(DEALER_ID_MIN, DEALER_ID_MESSAGE).max(DEALER_ID_MAX, DEALER_ID_MESSAGE));

export const loginSchema = z.object({
  DealerId: dealerIdSchema,
  Password: z.string({ required_error: 'Password is required.' }).min(1, 'Password is required.'),
});

export type LoginRequest = z.infer<typeof loginSchema>;
