import { BonusConsistencyWorker } from './bonus-consistency.worker';
import type {
  BonusReconciliationService,
  ClientConsistency,
  ConsistencyReport,
} from './bonus-reconciliation.service';
import type { MetricsService } from '../../core/metrics/metrics.service';
import type { AppConfigService } from '../../core/config/app-config.service';
import { InMemoryDataStore } from '../../../test/support/in-memory-data-store';
import { writeCheckpoint } from './bonus-recalc-checkpoint';

type MockFn<Return = unknown, Args extends unknown[] = unknown[]> = jest.Mock<
  Return,
  Args
>;

type ReconciliationStub = {
  checkConsistency: MockFn<Promise<ConsistencyReport>, []>;
};
type MetricsStub = {
  setGauge: MockFn<void, [string, number]>;
};
type ConfigStub = {
  isWorkersEnabled: MockFn<boolean, []>;
  getConsistencyCheckIntervalMs: MockFn<number, []>;
};

const brokenClient = (clientId: string, drift: number): ClientConsistency => ({
  clientId,
  balance: drift,
  ledgerSum: 0,
  drift,
  entryCount: 0,
  chainBreaks: [],
  consistent: false,
});

describe('BonusConsistencyWorker', () => {
  let store: InMemoryDataStore;
  let reconciliation: ReconciliationStub;
  let metrics: MetricsStub;
  let config: ConfigStub;
  let worker: BonusConsistencyWorker;

  beforeEach(() => {
    store = new InMemoryDataStore();
    reconciliation = {
      checkConsistency: jest.fn<Promise<ConsistencyReport>, []>().mockResolvedValue({
        checkedClients: 3,
        inconsistentClients: 2,
        clients: [brokenClient('8', 900), brokenClient('9', -50)],
      }),
    };
    metrics = { setGauge: jest.fn<void, [string, number]>() };
    config = {
      isWorkersEnabled: jest.fn<boolean, []>(() => false),
      getConsistencyCheckIntervalMs: jest.fn<number, []>(() => 1000),
    };
    worker = new BonusConsistencyWorker(
      store,
      reconciliation as unknown as BonusReconciliationService,
      metrics as unknown as MetricsService,
      config as unknown as AppConfigService,
    );
  });

  afterEach(() => {
    worker.onModuleDestroy();
    jest.useRealTimers();
  });

  it('exports the number of broken clients and the absolute drift', async () => {
    await worker.tick();

    expect(metrics.setGauge).toHaveBeenCalledWith('bonus_inconsistent_clients', 2);
    expect(metrics.setGauge).toHaveBeenCalledWith('bonus_balance_drift_minor', 950);
    expect(store.heldLocks.size).toBe(0);
  });

  it('skips the check while a recompute checkpoint is stored', async () => {
    await store.seed((session) =>
      writeCheckpoint(session.settings, {
        cursor: { dateClose: '2025-09-02 10:00:00', transactionId: '10' },
        processed: 1,
        startedAt: '2025-09-10T08:00:00.000Z',
      }),
    );

    await worker.tick();

    expect(reconciliation.checkConsistency).not.toHaveBeenCalled();
    expect(metrics.setGauge).not.toHaveBeenCalled();
    expect(store.heldLocks.size).toBe(0);
  });

  it('leaves the recompute lock free while it scans', async () => {
    let held: string[] = [];
    reconciliation.checkConsistency.mockImplementation(async () => {
      held = [...store.heldLocks];
      return { checkedClients: 0, inconsistentClients: 0, clients: [] };
    });

    await worker.tick();

    expect(held).toEqual(['bonus:consistency']);
  });

  it('skips the check while another instance scans', async () => {
    store.heldLocks.add('bonus:consistency');

    await worker.tick();

    expect(reconciliation.checkConsistency).not.toHaveBeenCalled();
  });

  it('does not schedule anything when workers are disabled', async () => {
    jest.useFakeTimers();
    worker.onModuleInit();

    await jest.advanceTimersByTimeAsync(5000);

    expect(reconciliation.checkConsistency).not.toHaveBeenCalled();
  });

  it('runs on the configured interval', async () => {
    jest.useFakeTimers();
    config.isWorkersEnabled.mockReturnValue(true);
    worker.onModuleInit();

    await jest.advanceTimersByTimeAsync(1000);
    expect(reconciliation.checkConsistency).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1000);
    expect(reconciliation.checkConsistency).toHaveBeenCalledTimes(2);
  });
});
