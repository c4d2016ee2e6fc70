import { Router, Request, Response, NextFunction } from 'express';
import type { Database } from '../database';
import type { ReplyService } from '../replies';
import {
  ServiceError,
  ServiceErrorCode,
  parseGenerateReplyRequest,
  parseHistoryLimit,
  parseReplyId,
  toReplyResponse,
} from '../models';

export const API_VERSION = '1.0';

export interface ApiDependencies {
  replyService: ReplyService;
  geminiApiConfigured: boolean;
  /** Present in persisted mode; used by the health check */
  database?: Database;
  historyMaxLimit: number;
}

const STATUS_BY_CODE: Record<ServiceErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  GENERATION_FAILURE: 500,
  STORAGE_FAILURE: 500,
};

function sendServiceError(res: Response, error: ServiceError): void {
  res.status(STATUS_BY_CODE[error.code]).json({
    error: error.code,
    detail: error.message,
  });
}

function httpStatusOf(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    return err.status;
  }
  return undefined;
}

// Error handling middleware
export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  console.error('API Error:', err);

  const statusCode = httpStatusOf(err) ?? 500;
  res.status(statusCode).json({
    error: statusCode >= 500 ? 'INTERNAL' : 'BAD_REQUEST',
    detail: err.message || 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack })
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    detail: `Route ${req.method} ${req.path} not found`,
  });
}

export function createApiRouter(dependencies: ApiDependencies): Router {
  const router = Router();
  const { replyService, geminiApiConfigured, database, historyMaxLimit } = dependencies;

  // GET / - Static service info
  router.get('/', (_req: Request, res: Response) => {
    const endpoints = ['/generate-reply'];
    if (replyService.persistent) {
      endpoints.push('/history', '/history/{id}');
    }

    res.json({
      message: 'AI Email Responder API',
      version: API_VERSION,
      endpoints,
    });
  });

  // GET /health - Health check endpoint for Docker/cloud deployments
  router.get('/health', async (_req: Request, res: Response) => {
    if (!database) {
      res.json({ status: 'healthy', gemini_api_configured: geminiApiConfigured });
      return;
    }

    let databaseStatus = 'connected';
    try {
      await database.ping();
    } catch (error) {
      console.warn('Health check: database ping failed:', error);
      databaseStatus = 'disconnected';
    }

    res.json({
      status: databaseStatus === 'connected' ? 'healthy' : 'degraded',
      gemini_api_configured: geminiApiConfigured,
      database: databaseStatus,
    });
  });

  // POST /generate-reply - Generate a reply in the requested tone
  router.post('/generate-reply', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = parseGenerateReplyRequest(req.body);
      if (!parsed.ok) {
        sendServiceError(res, parsed.error);
        return;
      }

      const result = await replyService.generateReply(parsed.value.emailText, parsed.value.tone);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json(toReplyResponse(result.value));
    } catch (error) {
      next(error);
    }
  });

  if (!replyService.persistent) {
    return router;
  }

  // GET /history - Most recent replies first
  router.get('/history', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const limit = parseHistoryLimit(req.query.limit, historyMaxLimit);
      if (!limit.ok) {
        sendServiceError(res, limit.error);
        return;
      }

      const result = await replyService.listReplies(limit.value);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json(result.value.map(toReplyResponse));
    } catch (error) {
      next(error);
    }
  });

  // GET /history/:id - A single stored reply
  router.get('/history/:id', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = parseReplyId(req.params.id);
      if (!id.ok) {
        sendServiceError(res, id.error);
        return;
      }

      const result = await replyService.getReply(id.value);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json(toReplyResponse(result.value));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
