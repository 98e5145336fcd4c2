import { Logger } from '@nestjs/common';

export type LoggerLike = {
  warn?: (message: string) => void;
  debug?: (message: string) => void;
  log?: (message: string) => void;
};

const defaultLogger = new Logger('ignored-error');

export const formatError = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  if (
    typeof err === 'number' ||
    typeof err === 'boolean' ||
    typeof err === 'bigint'
  ) {
    return String(err);
  }
  if (err == null) return 'unknown error';
  try {
    return JSON.stringify(err);
  } catch {
    return 'unknown error';
  }
};

export const logIgnoredError = (
  err: unknown,
  message?: string,
  logger?: LoggerLike,
  level: 'warn' | 'debug' = 'warn',
) => {
  const line = message ? `${message}: ${formatError(err)}` : formatError(err);
  const target = logger ?? defaultLogger;
  const write =
    (level === 'debug' ? target.debug : target.warn) ??
    target.log ??
    target.warn;
  if (typeof write !== 'function') return;
  try {
    write.call(target, line);
  } catch {
    // logging must never throw back into the caller
  }
};
