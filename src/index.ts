export { default as UnitOfWork } from './UnitOfWork';
export * as errors from './errors';
export * as backends from './backends';
export * as utils from './utils';
export * from './types';
