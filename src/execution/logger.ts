/**
 * The logging surface the executor writes to. `console` satisfies it, as do
 * most structured loggers.
 */
export interface Logger {
  debug: (message: string, ...meta: Array<unknown>) => void;
  info: (message: string, ...meta: Array<unknown>) => void;
  warn: (message: string, ...meta: Array<unknown>) => void;
  error: (message: string, ...meta: Array<unknown>) => void;
}

const noop = (): void => undefined;

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
