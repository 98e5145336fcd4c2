// Общий хук для тестов: метаданные декораторов, таймаут и окружение.
import 'reflect-metadata';

const DEFAULT_TIMEOUT = Number(process.env.JEST_TIMEOUT ?? 30000);

process.env.NODE_ENV = 'test';
process.env.WORKERS_ENABLED = '0';

if (typeof jest !== 'undefined' && typeof jest.setTimeout === 'function') {
  jest.setTimeout(DEFAULT_TIMEOUT);
}
