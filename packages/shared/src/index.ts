export const name = '@docvault/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
