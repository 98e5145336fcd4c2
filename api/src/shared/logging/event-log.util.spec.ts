import { countMetric, formatEvent, logEvent } from './event-log.util';

const recordingLogger = () => ({
  log: jest.fn<void, [string]>(),
  warn: jest.fn<void, [string]>(),
});

describe('event log', () => {
  it('tags each line with the domain of the event', () => {
    expect(formatEvent('bonus.posted', { transactionId: '10' })).toBe(
      '{"event":"bonus.posted","domain":"bonus","transactionId":"10"}',
    );
  });

  it('writes bigint ids and errors as strings', () => {
    expect(
      formatEvent('discount.recalculated', {
        transactionId: 1001n,
        error: new Error('numeric overflow'),
      }),
    ).toBe(
      '{"event":"discount.recalculated","domain":"discount","transactionId":"1001","error":"numeric overflow"}',
    );
  });

  it('sends warnings to the warn channel', () => {
    const logger = recordingLogger();

    logEvent(logger, 'bonus.consistency_drift', { drift: 950 }, 'warn');

    expect(logger.log).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      '{"event":"bonus.consistency_drift","domain":"bonus","drift":950}',
    );
  });

  it('still logs the event when the payload cannot be serialized', () => {
    const logger = recordingLogger();
    const payload: Record<string, unknown> = {};
    payload.self = payload;

    logEvent(logger, 'sales.transaction_created', payload);

    expect(logger.log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(logger.log.mock.calls[0][0])).toMatchObject({
      event: 'sales.transaction_created',
    });
  });

  it('does not let a failing counter escape', () => {
    const metrics = {
      inc: jest.fn(() => {
        throw new Error('registry closed');
      }),
    };

    expect(() =>
      countMetric(metrics, 'engine_failures_total', { engine: 'bonus' }),
    ).not.toThrow();
    expect(metrics.inc).toHaveBeenCalledWith(
      'engine_failures_total',
      { engine: 'bonus' },
      undefined,
    );
  });
});
