import { Module } from '@nestjs/common';
import { TransactionHooksService } from './transaction-hooks.service';
import { EngineFailuresService } from './engine-failures.service';

@Module({
  providers: [TransactionHooksService, EngineFailuresService],
  exports: [TransactionHooksService, EngineFailuresService],
})
export class HooksModule {}
