import { z } from 'zod';

export const AutoCategorizationSchema = z.object({
  transactionId: z.string(),
  categoryName: z.string().nullable(),
});

export type AutoCategorizationDTO = z.infer<typeof AutoCategorizationSchema>;
