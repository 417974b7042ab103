export const name = '@docvault/adapters';

export * from './embed';
