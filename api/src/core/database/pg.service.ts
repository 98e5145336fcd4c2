import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  Pool,
  types,
  type PoolClient,
  type QueryResult,
  type QueryResultRow,
} from 'pg';
import { AppConfigService } from '../config/app-config.service';

// `timestamp` columns come back as text; see DbTimestamp.
types.setTypeParser(types.builtins.TIMESTAMP, (value: string) => value);

export type Queryable = {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
};

@Injectable()
export class PgService implements Queryable, OnModuleDestroy {
  private readonly logger = new Logger(PgService.name);
  private readonly pool: Pool;
  private readonly slowQueryMs: number;

  constructor(config: AppConfigService) {
    this.slowQueryMs = config.getSlowQueryMs();
    this.pool = new Pool({
      connectionString: config.getDatabaseUrl(),
      max: config.getDatabasePoolMax(),
    });
    this.pool.on('error', (err) => {
      this.logger.error(`idle pg client error: ${err.message}`);
    });
  }

  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>> {
    return this.timed(text, () => this.pool.query<R>(text, values));
  }

  connect(): Promise<PoolClient> {
    return this.pool.connect();
  }

  /** Wraps a checked-out client so its queries get the same slow-query log. */
  bind(client: PoolClient): Queryable {
    return {
      query: <R extends QueryResultRow = QueryResultRow>(
        text: string,
        values?: unknown[],
      ) => this.timed(text, () => client.query<R>(text, values)),
    };
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  private async timed<T>(text: string, run: () => Promise<T>): Promise<T> {
    if (this.slowQueryMs <= 0) return run();
    const startedAt = Date.now();
    try {
      return await run();
    } finally {
      const duration = Date.now() - startedAt;
      if (duration >= this.slowQueryMs) {
        const preview =
          text.length > 500 ? `${text.slice(0, 500)}...` : text;
        this.logger.warn(`slow query: ${duration}ms sql="${preview}"`);
      }
    }
  }
}
