import { formatError, logIgnoredError } from './ignore-error.util';

export type EventDomain = 'bonus' | 'discount' | 'hooks' | 'sales' | 'settings';

/** `bonus.posted`, `discount.recalculated`: domain first, then what happened. */
export type EventName = `${EventDomain}.${string}`;

export type CounterName =
  | 'bonus_ledger_entries_total'
  | 'bonus_ledger_amount_total'
  | 'engine_failures_total'
  | 'discount_recalculations_total';

type EventLogger = {
  log: (message: string) => void;
  warn: (message: string) => void;
};

type CounterSink = {
  inc: (name: string, labels?: Record<string, string>, value?: number) => void;
};

// bigint ids and caught errors end up in payloads
const toJsonValue = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Error) return formatError(value);
  return value;
};

export const formatEvent = (
  event: EventName,
  payload: Record<string, unknown> = {},
): string => {
  const domain = event.slice(0, event.indexOf('.'));
  return JSON.stringify({ event, domain, ...payload }, toJsonValue);
};

/** One JSON line per domain event; drift and hook failures go out as warnings. */
export const logEvent = (
  logger: EventLogger,
  event: EventName,
  payload: Record<string, unknown> = {},
  level: 'log' | 'warn' = 'log',
) => {
  let line: string;
  try {
    line = formatEvent(event, payload);
  } catch (err) {
    line = JSON.stringify({ event, payloadError: formatError(err) });
  }
  if (level === 'warn') logger.warn(line);
  else logger.log(line);
};

/** Counter bumps never fail the write that triggered them. */
export const countMetric = (
  metrics: CounterSink,
  name: CounterName,
  labels?: Record<string, string>,
  value?: number,
) => {
  try {
    metrics.inc(name, labels, value);
  } catch (err) {
    logIgnoredError(err, `metric ${name}`);
  }
};
