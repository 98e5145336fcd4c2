import { Module } from '@nestjs/common';
import { SystemSettingsService } from './system-settings.service';
import { SettingsController } from './settings.controller';

@Module({
  providers: [SystemSettingsService],
  controllers: [SettingsController],
  exports: [SystemSettingsService],
})
export class SettingsModule {}
