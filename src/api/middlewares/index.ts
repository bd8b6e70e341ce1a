export { tracingMiddleware, getTraceId, TRACE_HEADER } from './tracingMiddleware';
export { validationMiddleware } from './validationMiddleware';
export type { ValidationType } from './validationMiddleware';
export { errorHandlerMiddleware, notFoundHandler } from './errorHandlerMiddleware';
