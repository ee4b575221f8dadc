/**
 * @digestbench/core: Shared types, configuration catalog, and validation schemas
 */

export * from './types.js';
export * from './constants.js';
export * from './configurations.js';
export * from './schemas.js';
export { getErrorMessage } from './errors.js';
