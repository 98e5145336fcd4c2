import { Module } from '@nestjs/common';
import { HooksModule } from '../hooks/hooks.module';
import { BonusPostingService } from './bonus-posting.service';
import { BonusPostingHook } from './bonus-posting.hook';
import { BonusControlService } from './bonus-control.service';
import { BonusReconciliationService } from './bonus-reconciliation.service';
import { BonusAccountsService } from './bonus-accounts.service';
import { BonusConsistencyWorker } from './bonus-consistency.worker';
import { BonusAdminController } from './bonus-admin.controller';
import { ClientBonusController } from './client-bonus.controller';

@Module({
  imports: [HooksModule],
  providers: [
    BonusPostingService,
    BonusPostingHook,
    BonusControlService,
    BonusReconciliationService,
    BonusAccountsService,
    BonusConsistencyWorker,
  ],
  controllers: [BonusAdminController, ClientBonusController],
  exports: [BonusControlService, BonusReconciliationService, BonusAccountsService],
})
export class BonusLedgerModule {}
