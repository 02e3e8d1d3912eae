import cors from 'cors';
import express, { Express, Response } from 'express';
import { z } from 'zod';
import { ChatFunctionDefinitionSchema, ChatFunctionResultSchema } from '../../application/dto/ChatDTO.js';
import {
  CategorizableTransactionSchema,
  UserCategorySchema,
  UserMerchantSchema,
} from '../../application/dto/TransactionInputDTO.js';
import { ProviderError, TooManyTransactionsError } from '../../application/errors/ProviderError.js';
import { LlmProviderPort } from '../../application/ports/LlmProviderPort.js';
import { OPENROUTER_MODELS } from '../adapters/llm/openrouter/models.js';
import { AppContainer } from '../bootstrap/AppContainer.js';

const AutoCategorizeBodySchema = z.object({
  transactions: z.array(CategorizableTransactionSchema),
  userCategories: z.array(UserCategorySchema).default([]),
  model: z.string().min(1).optional(),
});

const AutoDetectMerchantsBodySchema = z.object({
  transactions: z.array(CategorizableTransactionSchema),
  userMerchants: z.array(UserMerchantSchema).default([]),
  model: z.string().min(1).optional(),
});

const ChatBodySchema = z.object({
  prompt: z.string(),
  model: z.string().min(1).optional(),
  instructions: z.string().optional(),
  functions: z.array(ChatFunctionDefinitionSchema).optional(),
  functionResults: z.array(ChatFunctionResultSchema).optional(),
  previousResponseId: z.string().optional(),
  stream: z.boolean().default(false),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');

const statusFor = (error: ProviderError): number => (error instanceof TooManyTransactionsError ? 400 : 502);

const sendEvent = (res: Response, data: unknown, event?: string) => {
  if (event) {
    res.write(`event: ${event}\n`);
  }
  res.write(`data: ${JSON.stringify(data)}\n\n`);
};

export const createApp = (container: AppContainer): Express => {
  const app = express();
  const defaultModel = container.config.openRouter.defaultModel;

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '1mb' }));

  const requireProvider = (res: Response): LlmProviderPort | null => {
    if (!container.llmProvider) {
      res.status(503).json({
        success: false,
        error: 'OpenRouter is not configured. Set OPENROUTER_API_KEY to enable LLM features.',
      });
      return null;
    }

    return container.llmProvider;
  };

  const resolveModel = (provider: LlmProviderPort, res: Response, requested?: string): string | null => {
    const model = requested ?? defaultModel;

    if (!provider.supportsModel(model)) {
      res.status(400).json({ success: false, error: `Unsupported model: ${model}` });
      return null;
    }

    return model;
  };

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Finance LLM Provider',
      version: '0.1.0',
      openRouterConfigured: container.hasOpenRouter(),
      tracingEnabled: container.hasTracing(),
      defaultModel,
    });
  });

  app.get('/api/models', (req, res) => {
    res.json({ models: OPENROUTER_MODELS, defaultModel });
  });

  app.post('/api/auto-categorize', async (req, res) => {
    try {
      const provider = requireProvider(res);
      if (!provider) {
        return;
      }

      const body = AutoCategorizeBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: describeIssues(body.error) });
        return;
      }

      const model = resolveModel(provider, res, body.data.model);
      if (!model) {
        return;
      }

      const response = await provider.autoCategorize({
        transactions: body.data.transactions,
        userCategories: body.data.userCategories,
        model,
      });

      if (!response.success) {
        res.status(statusFor(response.error)).json({ success: false, error: response.error.message });
        return;
      }

      res.json({ success: true, model, categorizations: response.data });
    } catch (error) {
      res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  app.post('/api/auto-detect-merchants', async (req, res) => {
    try {
      const provider = requireProvider(res);
      if (!provider) {
        return;
      }

      const body = AutoDetectMerchantsBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: describeIssues(body.error) });
        return;
      }

      const model = resolveModel(provider, res, body.data.model);
      if (!model) {
        return;
      }

      const response = await provider.autoDetectMerchants({
        transactions: body.data.transactions,
        userMerchants: body.data.userMerchants,
        model,
      });

      if (!response.success) {
        res.status(statusFor(response.error)).json({ success: false, error: response.error.message });
        return;
      }

      res.json({ success: true, model, merchants: response.data });
    } catch (error) {
      res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  app.post('/api/chat', async (req, res) => {
    try {
      const provider = requireProvider(res);
      if (!provider) {
        return;
      }

      const body = ChatBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: describeIssues(body.error) });
        return;
      }

      const model = resolveModel(provider, res, body.data.model);
      if (!model) {
        return;
      }

      const { prompt, stream, ...options } = body.data;

      if (!stream) {
        const response = await provider.chatResponse(prompt, { ...options, model });

        if (!response.success) {
          res.status(statusFor(response.error)).json({ success: false, error: response.error.message });
          return;
        }

        res.json({ success: true, response: response.data });
        return;
      }

      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();

      const response = await provider.chatResponse(prompt, {
        ...options,
        model,
        streamer: (chunk) => sendEvent(res, chunk),
      });

      if (response.success) {
        sendEvent(res, { responseId: response.data.id }, 'done');
      } else {
        sendEvent(res, { error: response.error.message }, 'error');
      }
      res.end();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';

      if (res.headersSent) {
        sendEvent(res, { error: message }, 'error');
        res.end();
        return;
      }

      res.status(500).json({ success: false, error: message });
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({
      success: false,
      error: 'API endpoint not found',
      availableEndpoints: {
        health: 'GET /api/health',
        models: 'GET /api/models',
        autoCategorize: 'POST /api/auto-categorize',
        autoDetectMerchants: 'POST /api/auto-detect-merchants',
        chat: 'POST /api/chat',
      },
    });
  });

  return app;
};
