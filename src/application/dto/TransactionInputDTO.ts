import { z } from 'zod';

export const TransactionClassificationSchema = z.enum(['expense', 'income']);

export const CategorizableTransactionSchema = z.object({
  id: z.string().min(1),
  amount: z.number(),
  classification: TransactionClassificationSchema,
  description: z.string().optional(),
  merchant: z.string().optional(),
});

export const UserCategorySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  isSubcategory: z.boolean().optional(),
  parentId: z.string().nullable().optional(),
  classification: TransactionClassificationSchema,
});

export const UserMerchantSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
});

export type CategorizableTransactionDTO = z.infer<typeof CategorizableTransactionSchema>;
export type UserCategoryDTO = z.infer<typeof UserCategorySchema>;
export type UserMerchantDTO = z.infer<typeof UserMerchantSchema>;
