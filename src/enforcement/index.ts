/**
 * Enforcement Module
 */

export * from './types';
export * from './controller';
