import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
  type StoreSession,
} from '../../core/database/database.types';
import type {
  EngineFailureRecord,
  EngineName,
} from '../../core/database/entities';
import { MetricsService } from '../../core/metrics/metrics.service';
import { formatError } from '../../shared/logging/ignore-error.util';
import { logEvent, countMetric } from '../../shared/logging/event-log.util';
import { safeExecAsync } from '../../shared/safe-exec';

const MAX_ERROR_LENGTH = 2000;

/**
 * Fail-open execution for hooks: the work runs in a savepoint, and a failure
 * is rolled back, logged, counted and written to the dead-letter table while
 * the surrounding write carries on.
 */
@Injectable()
export class EngineFailuresService {
  private readonly logger = new Logger(EngineFailuresService.name);

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly metrics: MetricsService,
  ) {}

  async runContained(
    session: StoreSession,
    input: { engine: EngineName; eventType: string; transactionId: string },
    action: () => Promise<void>,
  ): Promise<boolean> {
    try {
      await session.savepoint(`${input.engine}_hook`, action);
      return true;
    } catch (err) {
      const errorMessage = formatError(err).slice(0, MAX_ERROR_LENGTH);
      logEvent(this.logger, `${input.engine}.hook_failed`, {
        transactionId: input.transactionId,
        eventType: input.eventType,
        error: errorMessage,
      }, 'warn');
      countMetric(this.metrics, 'engine_failures_total', {
        engine: input.engine,
      });
      await safeExecAsync(
        () =>
          session.savepoint('engine_failure', async () => {
            await session.failures.record({
              engine: input.engine,
              transactionId: input.transactionId,
              eventType: input.eventType,
              errorMessage,
            });
          }),
        () => undefined,
        this.logger,
        `engine_failures insert failed for transaction ${input.transactionId}`,
      );
      return false;
    }
  }

  listUnresolved(
    engine?: EngineName,
    limit?: number,
  ): Promise<EngineFailureRecord[]> {
    return this.store.transaction((s) =>
      s.failures.listUnresolved(engine, limit),
    );
  }
}
