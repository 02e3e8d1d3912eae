import { z } from 'zod';
import { AutoCategorizationDTO } from '../../../../application/dto/AutoCategorizationDTO.js';
import { CategorizableTransactionDTO, UserCategoryDTO } from '../../../../application/dto/TransactionInputDTO.js';
import { AutoCategorizeRequest } from '../../../../application/ports/LlmProviderPort.js';
import { ResponsesApi } from './ResponsesApi.js';
import { normalizeNullable, parseStructuredOutput } from './StructuredOutput.js';

export interface TransactionCategorizer {
  autoCategorize(request: AutoCategorizeRequest): Promise<AutoCategorizationDTO[]>;
}

const CategorizationsSchema = z.object({
  categorizations: z.array(
    z.object({
      transaction_id: z.string(),
      category_name: z.string().nullable(),
    }),
  ),
});

const INSTRUCTIONS = `You categorize bank and card transactions for a personal finance app.

Rules:
- Return exactly one categorization per transaction, keyed by the transaction's "id".
- Only use category names from the user's category list. Never invent a category.
- Expense transactions may only use expense categories; income transactions may only use income categories.
- When both a parent category and one of its subcategories fit, prefer the subcategory.
- If no category is a confident match, answer "null". An empty answer is better than a wrong one.`;

export class AutoCategorizer implements TransactionCategorizer {
  constructor(private readonly responses: ResponsesApi) {}

  async autoCategorize({ model, transactions, userCategories }: AutoCategorizeRequest): Promise<AutoCategorizationDTO[]> {
    if (transactions.length === 0) {
      return [];
    }

    const raw = await this.responses.create({
      model,
      instructions: INSTRUCTIONS,
      input: [{ role: 'developer', content: this.buildPrompt(transactions, userCategories) }],
      text: {
        format: {
          type: 'json_schema',
          name: 'auto_categorize_personal_finance_transactions',
          strict: true,
          schema: this.jsonSchema(transactions, userCategories),
        },
      },
    });

    const { categorizations } = parseStructuredOutput(raw, CategorizationsSchema, 'auto-categorization');
    const transactionIds = new Set(transactions.map((txn) => txn.id));
    const categoryNames = new Set(userCategories.map((category) => category.name));

    return categorizations
      .filter((item) => transactionIds.has(item.transaction_id))
      .map((item) => {
        const categoryName = normalizeNullable(item.category_name);

        return {
          transactionId: item.transaction_id,
          categoryName: categoryName !== null && categoryNames.has(categoryName) ? categoryName : null,
        };
      });
  }

  private buildPrompt(transactions: CategorizableTransactionDTO[], userCategories: UserCategoryDTO[]): string {
    return `The user's categories, as JSON:
\`\`\`json
${JSON.stringify(userCategories)}
\`\`\`

Categorize these transactions, as JSON:
\`\`\`json
${JSON.stringify(transactions)}
\`\`\``;
  }

  private jsonSchema(transactions: CategorizableTransactionDTO[], userCategories: UserCategoryDTO[]): Record<string, unknown> {
    return {
      type: 'object',
      properties: {
        categorizations: {
          type: 'array',
          description: 'One categorization per transaction',
          items: {
            type: 'object',
            properties: {
              transaction_id: {
                type: 'string',
                description: 'The id of the transaction being categorized',
                enum: [...new Set(transactions.map((txn) => txn.id))],
              },
              category_name: {
                type: 'string',
                description: 'Name of the matched category, or "null" when nothing matches',
                enum: [...new Set(userCategories.map((category) => category.name)), 'null'],
              },
            },
            required: ['transaction_id', 'category_name'],
            additionalProperties: false,
          },
        },
      },
      required: ['categorizations'],
      additionalProperties: false,
    };
  }
}
