import { Global, Module, type Type } from '@nestjs/common';
import { Test, type TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { DATA_STORE } from '../../src/core/database/database.types';
import { AppConfigService } from '../../src/core/config/app-config.service';
import { MetricsService } from '../../src/core/metrics/metrics.service';
import { SettingsModule } from '../../src/modules/settings/settings.module';
import { HooksModule } from '../../src/modules/hooks/hooks.module';
import { DiscountsModule } from '../../src/modules/discounts/discounts.module';
import { BonusLedgerModule } from '../../src/modules/bonus-ledger/bonus-ledger.module';
import { SalesModule } from '../../src/modules/sales/sales.module';
import { InMemoryDataStore } from './in-memory-data-store';

export type EngineHarness = {
  store: InMemoryDataStore;
  moduleRef: TestingModule;
  get<T>(type: Type<T>): T;
  close(): Promise<void>;
};

/** Feature modules on top of the in-memory store, with hooks registered. */
export async function createEngineHarness(): Promise<EngineHarness> {
  const store = new InMemoryDataStore();

  @Global()
  @Module({
    imports: [ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true })],
    providers: [
      AppConfigService,
      MetricsService,
      { provide: DATA_STORE, useValue: store },
    ],
    exports: [AppConfigService, MetricsService, DATA_STORE],
  })
  class InMemoryCoreModule {}

  const moduleRef = await Test.createTestingModule({
    imports: [
      InMemoryCoreModule,
      SettingsModule,
      HooksModule,
      DiscountsModule,
      BonusLedgerModule,
      SalesModule,
    ],
  }).compile();
  await moduleRef.init();

  return {
    store,
    moduleRef,
    get: <T>(type: Type<T>) => moduleRef.get(type),
    close: () => moduleRef.close(),
  };
}

/** Enables bonus posting from a fixed start date, as the seed script does. */
export async function enableBonusSystem(
  store: InMemoryDataStore,
  startDate = '2025-09-01',
): Promise<void> {
  await store.seed(async (session) => {
    await session.settings.upsert('bonus_system_enabled', 'true', null);
    await session.settings.upsert('bonus_system_start_date', startDate, null);
  });
}
