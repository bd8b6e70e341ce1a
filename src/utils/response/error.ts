/**
 * Error response utilities
 */

import type { Response } from 'express';
import type { ApiErrorResponse } from '../../types/api';

export const sendError = (
  res: Response,
  message: string = 'Internal Server Error',
  statusCode: number = 500,
  details?: unknown,
  traceId?: string
): Response<ApiErrorResponse> => {
  const response: ApiErrorResponse = {
    success: false,
    message,
    timestamp: new Date().toISOString(),
    traceId,
  };

  if (details !== undefined) {
    response.details = details;
  }

  return res.status(statusCode).json(response);
};

export const sendValidationError = (
  res: Response,
  message: string = 'Validation failed',
  details?: unknown,
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 400, details, traceId);
};

export const sendNotFound = (
  res: Response,
  message: string = 'Resource not found',
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 404, undefined, traceId);
};

// Duplicate keys on strict-create tables are reported as bad requests
export const sendConflict = (
  res: Response,
  message: string = 'Resource conflict',
  details?: unknown,
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 400, details, traceId);
};
