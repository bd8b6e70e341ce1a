/**
 * Success response utilities
 *
 * Records are sent as the body itself; the trace ID travels in the X-Trace-ID header.
 */

import type { Response } from 'express';

export const sendSuccess = <T>(res: Response, data: T, statusCode: number = 200): Response<T> => {
  return res.status(statusCode).json(data);
};

export const sendCreated = <T>(res: Response, data: T): Response<T> => {
  return sendSuccess(res, data, 201);
};

export const sendNoContent = (res: Response): Response => {
  return res.status(204).send();
};
