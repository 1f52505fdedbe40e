export { errorHandler } from './error-handler.js';
