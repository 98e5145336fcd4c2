import { Injectable } from '@nestjs/common';

@Injectable()
export class AppConfigService {
  getNodeEnv(): string {
    return this.getString('NODE_ENV', 'development') || 'development';
  }

  isProduction(): boolean {
    return this.getNodeEnv() === 'production';
  }

  isTest(): boolean {
    return this.getNodeEnv() === 'test';
  }

  getString(key: string, fallback?: string): string | undefined {
    const value = process.env[key];
    if (value === undefined || value === '') return fallback;
    return value;
  }

  getNumber(key: string, fallback?: number): number | undefined {
    const raw = this.getString(key);
    if (raw === undefined) return fallback;
    const num = Number(raw);
    return Number.isFinite(num) ? num : fallback;
  }

  getBoolean(key: string, fallback = false): boolean {
    const raw = this.getString(key);
    if (raw === undefined) return fallback;
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return fallback;
  }

  getDatabaseUrl(): string | undefined {
    return this.getString('DATABASE_URL');
  }

  getDatabasePoolMax(): number {
    const max = this.getNumber('DATABASE_POOL_MAX', 10) ?? 10;
    return Math.max(1, Math.floor(max));
  }

  getSlowQueryMs(): number {
    return Math.max(0, this.getNumber('DATABASE_SLOW_QUERY_MS', 0) ?? 0);
  }

  getPort(): number {
    return this.getNumber('PORT', 3000) ?? 3000;
  }

  getLogLevel(): string {
    return (
      this.getString('LOG_LEVEL') || (this.isProduction() ? 'info' : 'debug')
    );
  }

  getBonusRecalcBatchSize(): number {
    const size = this.getNumber('BONUS_RECALC_BATCH_SIZE', 500) ?? 500;
    return Math.min(10_000, Math.max(1, Math.floor(size)));
  }

  /** Discount hook errors abort the triggering write unless this is on. */
  isDiscountFailOpen(): boolean {
    return this.getBoolean('DISCOUNT_FAIL_OPEN', false);
  }

  getThrottleLimit(): number {
    return Math.max(1, this.getNumber('THROTTLE_LIMIT', 200) ?? 200);
  }

  isWorkersEnabled(): boolean {
    return this.getBoolean('WORKERS_ENABLED', !this.isTest());
  }

  /** 0 turns the periodic ledger/balance check off. */
  getConsistencyCheckIntervalMs(): number {
    return Math.max(
      0,
      this.getNumber('BONUS_CONSISTENCY_INTERVAL_MS', 3_600_000) ?? 0,
    );
  }
}
