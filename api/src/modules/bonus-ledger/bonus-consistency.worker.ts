import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
} from '../../core/database/database.types';
import { AppConfigService } from '../../core/config/app-config.service';
import { MetricsService } from '../../core/metrics/metrics.service';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';
import { logEvent } from '../../shared/logging/event-log.util';
import { BonusReconciliationService } from './bonus-reconciliation.service';
import type { ConsistencyReport } from './bonus-reconciliation.service';
import { readCheckpoint } from './bonus-recalc-checkpoint';

export const BONUS_CONSISTENCY_LOCK = 'bonus:consistency';

/** Periodic balance vs ledger check; exports the drift as gauges. */
@Injectable()
export class BonusConsistencyWorker implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BonusConsistencyWorker.name);
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly reconciliation: BonusReconciliationService,
    private readonly metrics: MetricsService,
    private readonly config: AppConfigService,
  ) {}

  onModuleInit() {
    if (!this.config.isWorkersEnabled()) {
      this.logger.log('Workers disabled (WORKERS_ENABLED=0)');
      return;
    }
    const intervalMs = this.config.getConsistencyCheckIntervalMs();
    if (intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) =>
        logIgnoredError(err, 'BonusConsistencyWorker tick', this.logger),
      );
    }, intervalMs);
    this.timer.unref();
    this.logger.log(`BonusConsistencyWorker started, interval=${intervalMs}ms`);
  }

  onModuleDestroy() {
    if (this.timer) clearInterval(this.timer);
  }

  async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      const outcome = await this.store.withExclusiveLock(
        BONUS_CONSISTENCY_LOCK,
        () => this.scan(),
      );
      if (!outcome.acquired || !outcome.result) return;
      const report = outcome.result;
      const drift = report.clients.reduce(
        (sum, client) => sum + Math.abs(client.drift),
        0,
      );
      this.metrics.setGauge('bonus_inconsistent_clients', report.inconsistentClients);
      this.metrics.setGauge('bonus_balance_drift_minor', drift);
      if (report.inconsistentClients > 0) {
        logEvent(this.logger, 'bonus.consistency_drift', {
          inconsistentClients: report.inconsistentClients,
          drift,
          clientIds: report.clients.slice(0, 20).map((client) => client.clientId),
        }, 'warn');
      }
    } finally {
      this.running = false;
    }
  }

  /** A stored checkpoint means the ledger is half-built; nothing to compare. */
  private async scan(): Promise<ConsistencyReport | null> {
    const checkpoint = await this.store.transaction((session) =>
      readCheckpoint(session.settings),
    );
    if (checkpoint) {
      this.logger.debug(
        `bonus recompute at ${checkpoint.processed} sales, consistency check skipped`,
      );
      return null;
    }
    return this.reconciliation.checkConsistency();
  }
}
