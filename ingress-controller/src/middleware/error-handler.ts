import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ValidationError } from '../utils/validation';

export class ApiError extends Error {
  status: number;
  code: string;
  details: Record<string, unknown>;

  constructor(status: number, code: string, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(new ApiError(404, 'not_found', 'Route not found'));
};

export const apiErrorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const error = err instanceof ValidationError ? new ApiError(400, 'validation_error', err.message, err.validationDetails) : err;

  if (error instanceof ApiError) {
    return res.status(error.status).json({
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
  }

  console.error(`Request ${req.requestId} failed:`, error);

  return res.status(500).json({
    error: {
      code: 'internal_error',
      message: 'Internal server error',
      details: {},
    },
  });
};
