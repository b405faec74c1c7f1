import type { Logger } from './ports/logger.js';

export type Namespace = 'Flatten' | 'Unflatten' | 'Collect' | 'Materialize';

export interface LoggerOptions {
  readonly verbose?: boolean;
}

export function createLogger(namespace: Namespace, options: LoggerOptions = {}): Logger {
  const prefix = `[confbundle:${namespace}]`;
  return {
    info: (msg: string) => console.log(`${prefix} ${msg}`),
    warn: (msg: string) => console.warn(`${prefix} ${msg}`),
    error: (msg: string, err?: unknown) =>
      err ? console.error(`${prefix} ${msg}`, err) : console.error(`${prefix} ${msg}`),
    debug: (msg: string) => {
      if (options.verbose) console.debug(`${prefix} ${msg}`);
    },
  };
}
