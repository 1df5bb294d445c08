/**
 * Status Tools Module
 */

export { handleServerHealth } from './handlers.js';
