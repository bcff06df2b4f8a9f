export * from './agreement';
export * from './audit';
