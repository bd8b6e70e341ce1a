import type { ZodError } from 'zod';
import type { ValidationErrorDetail } from '../types/api';

export function formatZodIssues(error: ZodError): ValidationErrorDetail[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}
