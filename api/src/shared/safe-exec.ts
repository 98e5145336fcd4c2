import { logIgnoredError, type LoggerLike } from './logging/ignore-error.util';

export const safeExecAsync = async <T>(
  action: () => Promise<T>,
  fallback: () => T | Promise<T>,
  logger?: LoggerLike,
  message?: string,
): Promise<T> => {
  try {
    return await action();
  } catch (err) {
    logIgnoredError(err, message, logger);
    return await fallback();
  }
};
