export { default as MemoryBackend } from './MemoryBackend';
export { default as LocalBackend } from './LocalBackend';
export { default as DBBackend } from './DBBackend';
export * as utils from './utils';
export * as errors from './errors';
export * from './types';
