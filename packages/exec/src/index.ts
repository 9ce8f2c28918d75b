export const name = '@lambdakit/exec';

export * from './runner/types';
export * from './runner/runner';
export * from './runner/fake';
export * from './tools/build';
export * from './tools/uv';
export * from './tools/sam';
export * from './tools/pytest';
