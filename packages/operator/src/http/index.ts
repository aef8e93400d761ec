/**
 * HTTP Module
 */

export { createRoutes, errorHandler, statusForError } from './routes.js';
export { validateCart, validateMetadata, validateAmount, validateId } from './validation.js';
