export * from './core';
export * from './types';
export { loadConfig, getDefaultConfig, validateConfig, mergeConfig } from './config';
