/**
 * Database service exports.
 */

export { DatabaseService } from './database.service.js';
