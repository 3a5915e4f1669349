export * from './logging/index.js';

export type { Logger } from 'pino';
