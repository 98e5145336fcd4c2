import { Module } from '@nestjs/common';
import { HooksModule } from '../hooks/hooks.module';
import { DiscountService } from './discount.service';
import { DiscountControlService } from './discount-control.service';
import { DiscountLineItemsHook, DiscountPaymentsHook } from './discount.hooks';
import { DiscountsAdminController } from './discounts-admin.controller';

@Module({
  imports: [HooksModule],
  providers: [
    DiscountService,
    DiscountControlService,
    DiscountLineItemsHook,
    DiscountPaymentsHook,
  ],
  controllers: [DiscountsAdminController],
  exports: [DiscountService, DiscountControlService],
})
export class DiscountsModule {}
