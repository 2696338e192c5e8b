import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';

import { AppError, describeError } from '../errors';
import { logger } from '../util/logger';

export const AVAILABLE_ENDPOINTS = [
  '/',
  '/health',
  '/generate_questions',
  '/generate_questions_from_resume',
];

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Forwards rejections from async route handlers to the error middleware. */
export const asyncHandler =
  (route: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    route(req, res, next).catch(next);
  };

export const requestLogger: RequestHandler = (req, res, next) => {
  const requestId = uuidv4();
  const startedAt = Date.now();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    logger.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      durationMs: Date.now() - startedAt,
    });
  });

  next();
};

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({
    error: 'Endpoint not found',
    available_endpoints: AVAILABLE_ENDPOINTS,
  });
};

const uploadErrorStatus = (error: multer.MulterError): number =>
  error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;

export const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  const requestId: unknown = res.locals.requestId;

  if (error instanceof multer.MulterError) {
    logger.warn('Rejected upload', { requestId, code: error.code, error: error.message });
    res.status(uploadErrorStatus(error)).json({ error: error.message });
    return;
  }

  if (error instanceof AppError) {
    const context = { requestId, type: error.name, error: error.message, ...error.details() };

    if (error.statusCode >= 500) {
      logger.error('Request failed', context);
    } else {
      logger.warn('Request rejected', context);
    }

    res.status(error.statusCode).json({ error: error.message, ...error.details() });
    return;
  }

  logger.error('Unexpected error', { requestId, error: describeError(error) });
  res.status(500).json({ error: 'Internal server error' });
};
