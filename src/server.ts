// ============================================================================
// FILE: src/server.ts
// PURPOSE: Express server exposing search and question answering
// ============================================================================

import type { Server } from 'http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { askWithContext } from './answer.js';
import type { EmbeddingProvider } from './embeddings.js';
import { ErrorCode, InvalidQueryError, SaraError, getErrorMessage } from './errors.js';
import type { ChatClient } from './llm-client.js';
import { createLogger } from './logger.js';
import { searchWithDistances } from './retrieval/search.js';

const logger = createLogger('Server');

export interface ServerDeps {
  embeddings: EmbeddingProvider;
  chat: ChatClient;
  indexPath: string;
  topK: number;
  maxContextChars: number;
  currency: string;
}

const SearchBody = z.object({
  query: z.string(),
  topK: z.number().int().positive().optional(),
});

const AskBody = z.object({
  question: z.string(),
  topK: z.number().int().positive().optional(),
});

// ============================================================================
// Error mapping
// ============================================================================

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.INVALID_QUERY]: 400,
  [ErrorCode.INDEX_NOT_FOUND]: 404,
  [ErrorCode.PROVIDER_ERROR]: 502,
};

export function statusForError(error: unknown): number {
  if (error instanceof SaraError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  return 500;
}

function sendError(res: Response, error: unknown, route: string): void {
  const status = statusForError(error);
  if (status >= 500) {
    logger.error(`${route} failed:`, getErrorMessage(error));
  }
  const code = error instanceof SaraError ? error.code : 'INTERNAL_ERROR';
  const message = error instanceof Error ? error.message : String(error);
  res.status(status).json({ error: message, code });
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidQueryError(`Invalid request body at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

// ============================================================================
// App
// ============================================================================

/**
 * createApp - Build the Express app around injected providers
 */
export function createApp(deps: ServerDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Nearest records for a query
  app.post('/api/search', async (req, res) => {
    try {
      const { query, topK } = parseBody(SearchBody, req.body);
      const results = await searchWithDistances(query, deps.indexPath, topK ?? deps.topK, deps.embeddings);
      res.json({
        results: results.map(r => ({ record: r.record, distance: r.distance })),
      });
    } catch (error) {
      sendError(res, error, '/api/search');
    }
  });

  // Retrieval-augmented answer
  app.post('/api/ask', async (req, res) => {
    try {
      const { question, topK } = parseBody(AskBody, req.body);
      const startTime = Date.now();
      const result = await askWithContext(question, deps, {
        topK: topK ?? deps.topK,
        maxContextChars: deps.maxContextChars,
        currency: deps.currency,
      });
      logger.info(`Answered with ${result.records.length} records in ${Date.now() - startTime}ms`);
      res.json({
        answer: result.answer,
        sources: result.records.map(r => r.source).filter(s => s.length > 0),
      });
    } catch (error) {
      sendError(res, error, '/api/ask');
    }
  });

  // Malformed JSON bodies from express.json()
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body', code: ErrorCode.INVALID_QUERY });
      return;
    }
    next(error);
  });

  return app;
}

/**
 * startServer - Listen on a port; rejects if the port cannot be bound
 */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
