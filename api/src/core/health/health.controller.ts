import { Controller, Get, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { PgService } from '../database/pg.service';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';

const REQUIRED_TABLES = [
  'clients',
  'transactions',
  'transaction_products',
  'transaction_bonus',
  'system_settings',
  'engine_failures',
];

@ApiTags('health')
@Controller()
export class HealthController {
  constructor(private readonly pg: PgService) {}

  @Get('healthz')
  async health(@Res({ passthrough: true }) res: Response) {
    const ts = new Date().toISOString();
    try {
      await this.pg.query('SELECT 1');
      res.status(200);
      return { ok: true, ts };
    } catch (err) {
      logIgnoredError(err, 'HealthController healthz', undefined, 'debug');
      res.status(503);
      return { ok: false, ts };
    }
  }

  @Get('readyz')
  async ready(@Res({ passthrough: true }) res: Response) {
    const ts = new Date().toISOString();
    let missing: string[] = REQUIRED_TABLES;
    let dbOk = false;
    try {
      const result = await this.pg.query<{ table_name: string }>(
        `SELECT table_name FROM information_schema.tables
          WHERE table_schema = current_schema() AND table_name = ANY($1::text[])`,
        [REQUIRED_TABLES],
      );
      dbOk = true;
      const present = new Set(result.rows.map((row) => row.table_name));
      missing = REQUIRED_TABLES.filter((table) => !present.has(table));
    } catch (err) {
      logIgnoredError(err, 'HealthController readyz', undefined, 'debug');
    }
    const ready = dbOk && missing.length === 0;
    res.status(ready ? 200 : 503);
    return { ready, ts, checks: { database: dbOk, schema: { missing } } };
  }
}
