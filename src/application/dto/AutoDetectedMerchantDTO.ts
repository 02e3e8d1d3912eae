import { z } from 'zod';

export const AutoDetectedMerchantSchema = z.object({
  transactionId: z.string(),
  businessName: z.string().nullable(),
  businessUrl: z.string().nullable(),
});

export type AutoDetectedMerchantDTO = z.infer<typeof AutoDetectedMerchantSchema>;
