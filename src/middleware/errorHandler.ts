import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { ApiError, ValidationError, type ApiErrorBody } from '../errors.js';

/**
 * Wrap an async route so rejections reach the error middleware.
 */
export function handle(
  fn: (req: Request, res: Response) => Promise<unknown> | unknown,
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

function isClientHttpError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export const notFound: RequestHandler = (_req, res) => {
  const body: ApiErrorBody = { error: 'Not found.', code: 'NOT_FOUND' };
  res.status(404).json(body);
};

export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof ApiError) {
    if (error.status === 401) {
      res.set('WWW-Authenticate', 'Token');
    }
    return res.status(error.status).json(error.toJSON());
  }

  if (error instanceof multer.MulterError) {
    const validation = new ValidationError({ [error.field ?? 'image']: [error.message] });
    return res.status(validation.status).json(validation.toJSON());
  }

  // Malformed JSON and oversized bodies from express.json()
  if (isClientHttpError(error)) {
    const body: ApiErrorBody = { error: error.message, code: 'BAD_REQUEST' };
    return res.status(error.status).json(body);
  }

  console.error('[API] Unhandled error:', error);
  const body: ApiErrorBody = { error: 'Internal server error', code: 'INTERNAL_ERROR' };
  res.status(500).json(body);
};
