/**
 * Compliance Monitor Module
 */

export * from './types';
export * from './manager';
