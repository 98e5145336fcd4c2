import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiConflictResponse,
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AdminGuard } from '../../core/guards/admin.guard';
import { ErrorDto } from '../../core/filters/error.dto';
import { TransactionHooksService } from '../hooks/transaction-hooks.service';
import { BonusControlService } from './bonus-control.service';
import { BonusReconciliationService } from './bonus-reconciliation.service';
import { BonusAccountsService } from './bonus-accounts.service';
import {
  AdjustBalanceDto,
  BonusRecalculationResultDto,
  ConsistencyQueryDto,
  LedgerEntryDto,
  LimitQueryDto,
  RecalculateBonusesDto,
  ToggleTriggersDto,
  TriggersStatusDto,
} from './dto/bonus.dto';

@Controller('admin/bonus')
@UseGuards(AdminGuard)
@ApiTags('bonus-admin')
@ApiHeader({ name: 'X-Admin-Key', required: true })
@ApiUnauthorizedResponse({ type: ErrorDto })
export class BonusAdminController {
  constructor(
    private readonly control: BonusControlService,
    private readonly reconciliation: BonusReconciliationService,
    private readonly accounts: BonusAccountsService,
    private readonly hooks: TransactionHooksService,
  ) {}

  @Post('triggers')
  @HttpCode(200)
  @ApiOperation({ summary: 'Включить/выключить автоматическое начисление бонусов' })
  @ApiOkResponse({ type: TriggersStatusDto })
  async toggleTriggers(@Body() dto: ToggleTriggersDto): Promise<TriggersStatusDto> {
    return { message: await this.control.manageBonusTriggers(dto.enable) };
  }

  @Get('triggers')
  @ApiOperation({ summary: 'Состояние хуков и контрольная точка пересчёта' })
  async status() {
    const [hooks, checkpoint] = await Promise.all([
      this.hooks.list(),
      this.control.getCheckpoint(),
    ]);
    return { hooks, checkpoint };
  }

  @Post('recalculate')
  @HttpCode(200)
  @ApiOperation({ summary: 'Полный пересчёт бонусного журнала' })
  @ApiOkResponse({ type: BonusRecalculationResultDto })
  @ApiConflictResponse({ type: ErrorDto })
  recalculate(
    @Body() dto: RecalculateBonusesDto,
  ): Promise<BonusRecalculationResultDto> {
    return this.control.recalculateAllBonuses({
      resume: dto.resume,
      batchSize: dto.batchSize,
    });
  }

  @Get('consistency')
  @ApiOperation({ summary: 'Сверка балансов клиентов с журналом' })
  consistency(@Query() query: ConsistencyQueryDto) {
    return this.reconciliation.checkConsistency(query.clientId);
  }

  @Post('adjustments')
  @ApiOperation({ summary: 'Ручное коригування или сгорание бонусов' })
  @ApiOkResponse({ type: LedgerEntryDto })
  adjust(@Body() dto: AdjustBalanceDto): Promise<LedgerEntryDto> {
    return this.accounts.adjustBalance({
      clientId: dto.clientId,
      amount: dto.amount,
      operationType: dto.operationType,
      description: dto.description ?? null,
    });
  }

  @Get('failures')
  @ApiOperation({ summary: 'Необработанные ошибки начисления' })
  failures(@Query() query: LimitQueryDto) {
    return this.reconciliation.listFailures(query.limit);
  }

  @Post('failures/retry')
  @HttpCode(200)
  @ApiOperation({ summary: 'Повторить начисление для ошибок из журнала' })
  retry(@Body() dto: LimitQueryDto) {
    return this.reconciliation.retryFailedPostings(dto.limit);
  }
}
