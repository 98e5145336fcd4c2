import {
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Put,
  UseGuards,
} from '@nestjs/common';
import {
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AdminGuard } from '../../core/guards/admin.guard';
import { ErrorDto } from '../../core/filters/error.dto';
import { SystemSettingsService } from './system-settings.service';
import { SetSettingDto, SettingDto } from './dto/settings.dto';

@Controller('admin/settings')
@UseGuards(AdminGuard)
@ApiTags('settings')
@ApiHeader({ name: 'X-Admin-Key', required: true })
export class SettingsController {
  constructor(private readonly settings: SystemSettingsService) {}

  @Get(':key')
  @ApiOperation({ summary: 'Прочитать системную настройку' })
  @ApiOkResponse({ type: SettingDto })
  @ApiUnauthorizedResponse({ type: ErrorDto })
  async get(@Param('key') key: string): Promise<SettingDto> {
    const record = await this.settings.getRecord(key);
    if (!record) throw new NotFoundException(`Setting ${key} not found`);
    return record;
  }

  @Put(':key')
  @ApiOperation({ summary: 'Записать системную настройку (upsert)' })
  @ApiOkResponse({ type: SettingDto })
  @ApiUnauthorizedResponse({ type: ErrorDto })
  set(
    @Param('key') key: string,
    @Body() dto: SetSettingDto,
  ): Promise<SettingDto> {
    return this.settings.set(key, dto.value, dto.description ?? null);
  }
}
