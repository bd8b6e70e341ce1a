/**
 * API-related type definitions
 */

export interface ApiErrorResponse {
  success: false;
  message: string;
  details?: unknown;
  timestamp: string;
  traceId?: string;
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  code: string;
}
