import { Controller, Get, Param, Query, UseGuards } from '@nestjs/common';
import {
  ApiHeader,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ApiKeyGuard } from '../../core/guards/api-key.guard';
import { ErrorDto } from '../../core/filters/error.dto';
import { BonusAccountsService } from './bonus-accounts.service';
import { ClientBonusDto, LimitQueryDto } from './dto/bonus.dto';

/** Read model for the Telegram bot. */
@Controller('clients')
@UseGuards(ApiKeyGuard)
@ApiTags('clients')
@ApiHeader({ name: 'X-Api-Key', required: true })
export class ClientBonusController {
  constructor(private readonly accounts: BonusAccountsService) {}

  @Get(':clientId/bonus')
  @ApiOkResponse({ type: ClientBonusDto })
  @ApiNotFoundResponse({ type: ErrorDto })
  getBonus(
    @Param('clientId') clientId: string,
    @Query() query: LimitQueryDto,
  ): Promise<ClientBonusDto> {
    return this.accounts.getClientBonus(clientId, query.limit ?? 10);
  }
}
