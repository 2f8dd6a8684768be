export type Logger = Pick<Console, 'info' | 'warn' | 'error' | 'debug'>;

export const consoleLogger: Logger = console;

const noop = () => undefined;

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop
};
