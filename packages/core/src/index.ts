export * from './types';
export * from './schemas';
export * from './errors';
export { Defects, childPath } from './defects';
export { log, createLogger } from './logger';
export type { Logger } from './logger';
