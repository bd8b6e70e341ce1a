export { sendSuccess, sendCreated, sendNoContent } from './success';
export { sendError, sendValidationError, sendNotFound, sendConflict } from './error';
