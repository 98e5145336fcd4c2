import {
  Body,
  Controller,
  Delete,
  Param,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiConflictResponse,
  ApiHeader,
  ApiNotFoundResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { ApiKeyGuard } from '../../core/guards/api-key.guard';
import { ErrorDto } from '../../core/filters/error.dto';
import { SalesService } from './sales.service';
import {
  CreateTransactionDto,
  LineItemInputDto,
  UpdateLineItemDto,
  UpdateTransactionDto,
  UpsertClientDto,
} from './dto/sales.dto';

@Controller('sales')
@UseGuards(ApiKeyGuard)
@ApiTags('sales')
@ApiHeader({ name: 'X-Api-Key', required: true })
@ApiUnauthorizedResponse({ type: ErrorDto })
export class SalesController {
  constructor(private readonly sales: SalesService) {}

  @Post('clients')
  @ApiOperation({ summary: 'Создать или обновить клиента' })
  upsertClient(@Body() dto: UpsertClientDto) {
    return this.sales.upsertClient(dto);
  }

  @Post('transactions')
  @ApiOperation({ summary: 'Записать продажу (с позициями)' })
  @ApiConflictResponse({ type: ErrorDto })
  @ApiNotFoundResponse({ type: ErrorDto })
  createTransaction(@Body() dto: CreateTransactionDto) {
    return this.sales.createTransaction(dto);
  }

  @Patch('transactions/:id')
  @ApiOperation({ summary: 'Обновить продажу' })
  @ApiNotFoundResponse({ type: ErrorDto })
  updateTransaction(@Param('id') id: string, @Body() dto: UpdateTransactionDto) {
    return this.sales.updateTransaction(id, dto);
  }

  @Post('transactions/:id/items')
  @ApiOperation({ summary: 'Добавить позицию' })
  @ApiNotFoundResponse({ type: ErrorDto })
  addItem(@Param('id') id: string, @Body() dto: LineItemInputDto) {
    return this.sales.addLineItem(id, dto);
  }

  @Patch('items/:id')
  @ApiOperation({ summary: 'Изменить позицию' })
  @ApiNotFoundResponse({ type: ErrorDto })
  updateItem(@Param('id') id: string, @Body() dto: UpdateLineItemDto) {
    return this.sales.updateLineItem(id, dto);
  }

  @Delete('items/:id')
  @ApiOperation({ summary: 'Удалить позицию' })
  @ApiNotFoundResponse({ type: ErrorDto })
  removeItem(@Param('id') id: string) {
    return this.sales.removeLineItem(id);
  }
}
