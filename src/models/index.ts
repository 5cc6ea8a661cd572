/**
 * Models module exports
 */

// Type definitions
export * from '../types/models';

// Validation functions and schemas
export * from './validation';

// Error taxonomy
export * from './errors';

// Model transformers
export * from './transformers';

// Database migrations
export * from '../database/migrations';

// Configuration
export { openDatabase, getDatabase, closeDatabase } from '../config/database';
