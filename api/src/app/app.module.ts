import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { AppConfigModule } from '../core/config/config.module';
import { AppConfigService } from '../core/config/app-config.service';
import { DatabaseModule } from '../core/database/database.module';
import { MetricsModule } from '../core/metrics/metrics.module';
import { HealthModule } from '../core/health/health.module';
import { RequestIdMiddleware } from '../core/middleware/request-id.middleware';
import { SettingsModule } from '../modules/settings/settings.module';
import { HooksModule } from '../modules/hooks/hooks.module';
import { BonusLedgerModule } from '../modules/bonus-ledger/bonus-ledger.module';
import { DiscountsModule } from '../modules/discounts/discounts.module';
import { SalesModule } from '../modules/sales/sales.module';

@Module({
  imports: [
    AppConfigModule,
    ThrottlerModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: (config: AppConfigService) => [
        { name: 'default', ttl: 60_000, limit: config.getThrottleLimit() },
      ],
    }),
    DatabaseModule,
    MetricsModule,
    HealthModule,
    SettingsModule,
    HooksModule,
    DiscountsModule,
    BonusLedgerModule,
    SalesModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestIdMiddleware).forRoutes('*');
  }
}
