import debug from 'debug';

type LogSink = (message: string) => void;

let logger: LogSink | undefined;
const debugLogger = debug('certlens');

export function setLogger(fn: LogSink | undefined): void {
  logger = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (logger) {
    logger(warnMessage);
  }

  debugLogger(warnMessage, ...args);
}
