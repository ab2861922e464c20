import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import rateLimit from 'express-rate-limit';
import type { SegmentTable } from '../dataset/segment-table.js';
import type { Answer, QueryRouter } from '../router/index.js';
import logger from '../utils/logger.js';

export interface ChatRoutesOptions {
  queryRouter: QueryRouter;
  table: SegmentTable;
  rateLimit: { windowMs: number; maxRequests: number };
}

const askSchema = z.object({
  question: z.string().trim().min(1).max(2000),
});

function toResponse(answer: Answer) {
  return {
    answer: answer.text,
    intent: answer.intent,
    source: answer.source,
    ...(answer.table ? { table: answer.table } : {}),
    status: 'success' as const,
  };
}

export function createChatRouter(options: ChatRoutesOptions): Router {
  const router = Router();

  router.use(rateLimit({
    windowMs: options.rateLimit.windowMs,
    limit: options.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn('Chat rate limit exceeded', { ip: req.ip });
      res.status(429).json({
        error: 'Rate limit exceeded',
        retryAfter: Math.ceil(options.rateLimit.windowMs / 1000),
      });
    },
  }));

  async function handle(input: unknown, res: Response): Promise<void> {
    const parsed = askSchema.safeParse(input);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation error', details: parsed.error.errors });
      return;
    }

    const answer = await options.queryRouter.ask(parsed.data.question, options.table);
    res.json(toResponse(answer));
  }

  // POST /api/chat - Ask a question
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    handle(req.body, res).catch(next);
  });

  // GET /api/chat?question=... - Ask a question via query string
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    handle({ question: req.query.question }, res).catch(next);
  });

  return router;
}
