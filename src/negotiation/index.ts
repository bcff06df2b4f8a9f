/**
 * Negotiation Module
 */

export * from './types';
export * from './engine';
export * from './prompts';
export * from './time-parser';
