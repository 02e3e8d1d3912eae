import { z } from 'zod';
import { AutoDetectedMerchantDTO } from '../../../../application/dto/AutoDetectedMerchantDTO.js';
import { CategorizableTransactionDTO, UserMerchantDTO } from '../../../../application/dto/TransactionInputDTO.js';
import { AutoDetectMerchantsRequest } from '../../../../application/ports/LlmProviderPort.js';
import { ResponsesApi } from './ResponsesApi.js';
import { normalizeNullable, parseStructuredOutput } from './StructuredOutput.js';

export interface MerchantDetector {
  autoDetectMerchants(request: AutoDetectMerchantsRequest): Promise<AutoDetectedMerchantDTO[]>;
}

const MerchantsSchema = z.object({
  merchants: z.array(
    z.object({
      transaction_id: z.string(),
      business_name: z.string().nullable(),
      business_url: z.string().nullable(),
    }),
  ),
});

const INSTRUCTIONS = `You identify the business behind bank and card transactions for a personal finance app.

Rules:
- Return exactly one result per transaction, keyed by the transaction's "id".
- If the business is one of the user's merchants, use that merchant's name exactly as given.
- Otherwise use the business's common name and its website domain (for example "amazon.com"), without scheme or path.
- Answer "null" for both name and url when the description does not clearly identify a business, including transfers, ATM withdrawals, payroll and fees.
- Never guess a domain you are not sure of; answer "null" for the url instead.`;

export class AutoMerchantDetector implements MerchantDetector {
  constructor(private readonly responses: ResponsesApi) {}

  async autoDetectMerchants({
    model,
    transactions,
    userMerchants,
  }: AutoDetectMerchantsRequest): Promise<AutoDetectedMerchantDTO[]> {
    if (transactions.length === 0) {
      return [];
    }

    const raw = await this.responses.create({
      model,
      instructions: INSTRUCTIONS,
      input: [{ role: 'developer', content: this.buildPrompt(transactions, userMerchants) }],
      text: {
        format: {
          type: 'json_schema',
          name: 'auto_detect_personal_finance_merchants',
          strict: true,
          schema: this.jsonSchema(transactions),
        },
      },
    });

    const { merchants } = parseStructuredOutput(raw, MerchantsSchema, 'merchant detection');
    const transactionIds = new Set(transactions.map((txn) => txn.id));

    return merchants
      .filter((item) => transactionIds.has(item.transaction_id))
      .map((item) => ({
        transactionId: item.transaction_id,
        businessName: normalizeNullable(item.business_name),
        businessUrl: normalizeNullable(item.business_url),
      }));
  }

  private buildPrompt(transactions: CategorizableTransactionDTO[], userMerchants: UserMerchantDTO[]): string {
    return `The user's merchants, as JSON:
\`\`\`json
${JSON.stringify(userMerchants)}
\`\`\`

Detect the business behind these transactions, as JSON:
\`\`\`json
${JSON.stringify(transactions)}
\`\`\``;
  }

  private jsonSchema(transactions: CategorizableTransactionDTO[]): Record<string, unknown> {
    return {
      type: 'object',
      properties: {
        merchants: {
          type: 'array',
          description: 'One detected merchant per transaction',
          items: {
            type: 'object',
            properties: {
              transaction_id: {
                type: 'string',
                description: 'The id of the transaction',
                enum: [...new Set(transactions.map((txn) => txn.id))],
              },
              business_name: {
                type: 'string',
                description: 'Business name, or "null" when unknown',
              },
              business_url: {
                type: 'string',
                description: 'Business website domain, or "null" when unknown',
              },
            },
            required: ['transaction_id', 'business_name', 'business_url'],
            additionalProperties: false,
          },
        },
      },
      required: ['merchants'],
      additionalProperties: false,
    };
  }
}
