/**
 * HTTP API
 *
 * - GET  /health
 * - POST /api/proposals  { subject }  ?format=json|markdown
 */

import express from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { ApiErrorBody, ProposalBundle } from '@usecase-studio/shared-types';
import { describeError } from './errors.js';
import { createLogger } from './logging/log.js';
import { renderResourceLinksMarkdown, resourceFileName } from './report/markdown.js';

const log = createLogger('http');

const MAX_SUBJECT_LENGTH = 200;

/** The slice of ProposalOrchestrator the API needs. */
export interface ProposalService {
  orchestrate(subjectName: string): Promise<ProposalBundle>;
}

export interface AppOptions {
  orchestrator: ProposalService;
  /** Browser origins allowed by CORS. Requests without an Origin header always pass. */
  allowedOrigins?: string[];
}

const createProposalSchema = z.object({
  subject: z
    .string({ required_error: 'subject is required', invalid_type_error: 'subject must be a string' })
    .trim()
    .min(1, 'subject must not be empty')
    .max(MAX_SUBJECT_LENGTH, `subject must be at most ${MAX_SUBJECT_LENGTH} characters`),
});

const formatSchema = z.enum(['json', 'markdown']).default('json');

function errorBody(error: string, message: string): ApiErrorBody {
  return { error, message };
}

class OriginNotAllowedError extends Error {
  constructor(readonly origin: string) {
    super(`Origin ${origin} is not allowed`);
    this.name = 'OriginNotAllowedError';
  }
}

/** Errors passed to next() by middleware (CORS, body parsing) become JSON bodies. */
const handleError: express.ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (error instanceof OriginNotAllowedError) {
    res.status(403).json(errorBody('ORIGIN_NOT_ALLOWED', error.message));
    return;
  }
  if (error instanceof SyntaxError) {
    res.status(400).json(errorBody('INVALID_REQUEST', 'Request body is not valid JSON'));
    return;
  }
  log.error(`unhandled request error: ${describeError(error)}`);
  res.status(500).json(errorBody('INTERNAL_ERROR', describeError(error)));
};

export function createApp(options: AppOptions): express.Express {
  const app = express();
  const allowedOrigins = options.allowedOrigins ?? [];

  // Request logging middleware
  app.use((req, res, next) => {
    const requestIdHeader = req.headers['x-request-id'];
    const requestId =
      (typeof requestIdHeader === 'string' && requestIdHeader.trim()) ||
      `req-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    res.setHeader('X-Request-ID', requestId);
    log.info(`[${requestId}] ${req.method} ${req.url} - Origin: ${req.headers.origin || 'none'}`);
    next();
  });

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        log.warn(`[CORS] Blocking origin: ${origin}`);
        callback(new OriginNotAllowedError(origin));
      },
      maxAge: 86400,
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
      methods: ['GET', 'POST', 'OPTIONS'],
    }),
  );

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.post('/api/proposals', async (req, res) => {
    const body = createProposalSchema.safeParse(req.body);
    if (!body.success) {
      const message = body.error.issues.map(issue => issue.message).join('; ');
      res.status(400).json(errorBody('INVALID_REQUEST', message));
      return;
    }
    const format = formatSchema.safeParse(req.query.format);
    if (!format.success) {
      res.status(400).json(errorBody('INVALID_REQUEST', 'format must be "json" or "markdown"'));
      return;
    }

    try {
      const bundle = await options.orchestrator.orchestrate(body.data.subject);

      if (format.data === 'json') {
        res.json({ ok: true, bundle });
        return;
      }

      const markdown = renderResourceLinksMarkdown(bundle);
      if (markdown === null) {
        res.status(404).json(errorBody('NO_RESOURCES', 'No resource links were collected'));
        return;
      }
      const fileName = resourceFileName(bundle.researchData?.inputName ?? body.data.subject);
      res.attachment(fileName);
      res.type('text/markdown; charset=utf-8');
      res.send(markdown);
    } catch (error: unknown) {
      log.error(`proposal request failed: ${describeError(error)}`);
      res.status(500).json(errorBody('INTERNAL_ERROR', describeError(error)));
    }
  });

  app.use((req, res) => {
    res.status(404).json(errorBody('NOT_FOUND', `No route for ${req.method} ${req.path}`));
  });
  app.use(handleError);

  return app;
}
