export * from './types';
export * from './constants';
export * from './tracing';
export * from './labels';
export * from './ring-buffer';
export * from './events';
export * from './errors';
export * from './logger';
export * from './config';
