export type { FileSystemPort } from './file-system.js';
export type { Logger } from './logger.js';
