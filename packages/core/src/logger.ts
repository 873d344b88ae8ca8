export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

const PREFIX = "[qsf-export]";

export const consoleLogger: Logger = {
  debug(message, context) {
    if (context) console.debug(PREFIX, message, context);
    else console.debug(PREFIX, message);
  },
  info(message, context) {
    if (context) console.info(PREFIX, message, context);
    else console.info(PREFIX, message);
  },
  warn(message, context) {
    if (context) console.warn(PREFIX, message, context);
    else console.warn(PREFIX, message);
  },
};

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
};

export type LoggerOptions = {
  logger?: Logger;
};
