export const name = '@hunkwise/shared';

export * from './types/events';
export * from './types/patch';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';
