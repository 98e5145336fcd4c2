import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppConfigService } from './app-config.service';
import { ConfigCheckService } from './config-check.service';

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, cache: true })],
  providers: [AppConfigService, ConfigCheckService],
  exports: [AppConfigService],
})
export class AppConfigModule {}
