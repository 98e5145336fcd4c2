import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { AppConfigService } from './app-config.service';

const PLACEHOLDER_KEYS: Record<string, string[]> = {
  ADMIN_KEY: ['change_me_admin_key', 'admin', 'test-admin-key'],
  API_KEY: ['change_me_api_key', 'test-key', 'dev-api-key'],
};

@Injectable()
export class ConfigCheckService implements OnModuleInit {
  private readonly logger = new Logger(ConfigCheckService.name);

  constructor(private readonly config: AppConfigService) {}

  onModuleInit() {
    if (this.config.isTest()) return;

    const hasValue = (key: string) => {
      const value = this.config.getString(key);
      return typeof value === 'string' && value.trim() !== '';
    };

    const required = ['DATABASE_URL', 'ADMIN_KEY'];
    const requiredInProd = ['API_KEY', 'METRICS_TOKEN'];
    const missing = [
      ...required.filter((key) => !hasValue(key)),
      ...(this.config.isProduction()
        ? requiredInProd.filter((key) => !hasValue(key))
        : []),
    ];
    if (missing.length) {
      this.logger.warn(`Missing required env vars: ${missing.join(', ')}`);
    }

    if (this.config.isProduction()) {
      const insecure = Object.keys(PLACEHOLDER_KEYS).filter((key) => {
        const value = this.config.getString(key)?.trim();
        return !!value && PLACEHOLDER_KEYS[key].includes(value);
      });
      if (insecure.length) {
        this.logger.warn(
          `Insecure placeholder values detected for: ${insecure.join(', ')}`,
        );
      }
    }

    if (this.config.isDiscountFailOpen()) {
      this.logger.warn(
        'DISCOUNT_FAIL_OPEN is on: discount hook errors are recorded and the triggering write commits',
      );
    }
  }
}
