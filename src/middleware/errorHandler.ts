import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        status: err.statusCode,
        ...(err.code ? { code: err.code } : {}),
      },
    });
    return;
  }

  if (err instanceof z.ZodError) {
    res.status(400).json({
      error: {
        message: 'Invalid request',
        status: 400,
        code: 'VALIDATION_ERROR',
        details: err.issues,
      },
    });
    return;
  }

  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({
      error: { message: err.message, status, code: err.code },
    });
    return;
  }

  logger.error({ err, method: req.method, path: req.path }, 'Unexpected error');
  res.status(500).json({
    error: {
      message: 'Internal server error',
      status: 500,
    },
  });
}
