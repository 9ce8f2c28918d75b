export const name = '@lambdakit/core';

export * from './config/loader';
export * from './project/discovery';
export * from './manifest/types';
export * from './manifest/parser';
export * from './archive/zip';
export * from './layer/collector';
export * from './layer/installer';
export * from './layer/packager';
export * from './layer/assembler';
export * from './layer/builder';
export * from './functions/builder';
export * from './template/sam';
export * from './invoke/invoker';
export * from './testing/runner';
