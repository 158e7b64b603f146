import { z } from 'zod';

// numeric and bigint columns arrive as strings
export const priceRowSchema = z.object({ price: z.coerce.number() });
export const countRowSchema = z.object({ count: z.coerce.number().int() });
export const idRowSchema = z.object({ id: z.coerce.number().int() });
