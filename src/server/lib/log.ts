export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

const PREFIX = '[quality-metrics]';

export const consoleLogger: Logger = {
  info: (...args: unknown[]) => console.log(PREFIX, ...args),
  warn: (...args: unknown[]) => console.warn(PREFIX, ...args),
  error: (...args: unknown[]) => console.error(PREFIX, ...args),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
