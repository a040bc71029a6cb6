export { consoleLogger, silentLogger, createScopedLogger } from './logger';

export type { ILogger } from './logger';
