/**
 * Compliance Module
 */

export * from './types';
export * from './tracker';
