import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app/app.module';
import { BonusControlService } from '../src/modules/bonus-ledger/bonus-control.service';
import { BonusReconciliationService } from '../src/modules/bonus-ledger/bonus-reconciliation.service';
import { DiscountControlService } from '../src/modules/discounts/discount-control.service';
import {
  USAGE,
  UsageError,
  flagValue,
  parseBatchSize,
  parseSwitch,
} from './cli-args';

async function main() {
  const [command, ...args] = process.argv.slice(2);
  if (!command) {
    console.log(USAGE);
    return;
  }
  const batchSize =
    command === 'recalculate-bonuses' ? parseBatchSize(args) : undefined;
  process.env.WORKERS_ENABLED ??= '0';
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  try {
    switch (command) {
      case 'bonus-triggers':
        console.log(
          await app.get(BonusControlService).manageBonusTriggers(parseSwitch(args[0])),
        );
        break;
      case 'discount-triggers':
        console.log(
          await app
            .get(DiscountControlService)
            .manageDiscountTriggers(parseSwitch(args[0])),
        );
        break;
      case 'recalculate-bonuses': {
        const result = await app.get(BonusControlService).recalculateAllBonuses({
          resume: args.includes('--resume'),
          batchSize,
        });
        console.log(JSON.stringify(result, null, 2));
        break;
      }
      case 'recalculate-discounts':
        console.log(
          JSON.stringify(
            await app.get(DiscountControlService).recalculateAllDiscounts(),
            null,
            2,
          ),
        );
        break;
      case 'consistency': {
        const report = await app
          .get(BonusReconciliationService)
          .checkConsistency(flagValue(args, '--client'));
        console.log(JSON.stringify(report, null, 2));
        if (report.inconsistentClients > 0) process.exitCode = 2;
        break;
      }
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } finally {
    await app.close();
  }
}

main().catch((error) => {
  if (error instanceof UsageError) {
    console.error(error.message);
    process.exit(64);
  }
  console.error(error);
  process.exit(1);
});
