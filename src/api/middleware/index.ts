export { createErrorHandler, errorHandler, notFoundHandler } from './error-handler.js';
