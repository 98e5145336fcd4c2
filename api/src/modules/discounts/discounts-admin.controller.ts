import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiHeader,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AdminGuard } from '../../core/guards/admin.guard';
import { ErrorDto } from '../../core/filters/error.dto';
import { ToggleTriggersDto, TriggersStatusDto } from '../bonus-ledger/dto/bonus.dto';
import { DiscountService } from './discount.service';
import { DiscountControlService } from './discount-control.service';
import {
  DiscountCalculationDto,
  DiscountRecalculationResultDto,
  DiscountUpdateDto,
  RecalculateDiscountBatchDto,
} from './dto/discount.dto';

@Controller('admin/discounts')
@UseGuards(AdminGuard)
@ApiTags('discounts-admin')
@ApiHeader({ name: 'X-Admin-Key', required: true })
@ApiUnauthorizedResponse({ type: ErrorDto })
export class DiscountsAdminController {
  constructor(
    private readonly discounts: DiscountService,
    private readonly control: DiscountControlService,
  ) {}

  @Post('triggers')
  @HttpCode(200)
  @ApiOperation({ summary: 'Включить/выключить автоматический расчёт скидок' })
  @ApiOkResponse({ type: TriggersStatusDto })
  async toggleTriggers(@Body() dto: ToggleTriggersDto): Promise<TriggersStatusDto> {
    return { message: await this.control.manageDiscountTriggers(dto.enable) };
  }

  @Post('recalculate')
  @HttpCode(200)
  @ApiOperation({ summary: 'Пересчитать скидки всех транзакций' })
  @ApiOkResponse({ type: DiscountRecalculationResultDto })
  recalculateAll(): Promise<DiscountRecalculationResultDto> {
    return this.control.recalculateAllDiscounts();
  }

  @Post('recalculate-batch')
  @HttpCode(200)
  @ApiOperation({ summary: 'Пересчитать скидки выбранных транзакций' })
  @ApiOkResponse({ type: [DiscountUpdateDto] })
  recalculateBatch(
    @Body() dto: RecalculateDiscountBatchDto,
  ): Promise<DiscountUpdateDto[]> {
    return this.discounts.recalculateDiscounts(dto.transactionIds);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Рассчитать скидку без записи' })
  @ApiOkResponse({ type: DiscountCalculationDto })
  @ApiNotFoundResponse({ type: ErrorDto })
  calculate(@Param('id') id: string): Promise<DiscountCalculationDto> {
    return this.discounts.calculateSingleDiscount(id);
  }
}
