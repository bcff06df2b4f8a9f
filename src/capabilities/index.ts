/**
 * Capabilities Module
 */

export * from './types';
export * from './registry';
