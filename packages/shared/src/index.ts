export const name = '@lambdakit/shared';

export * from './logger';
export * from './errors';
export * from './fs/path';
export * from './fs/io';
export * from './config/schema';
