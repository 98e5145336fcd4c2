import type { Queryable } from '../pg.service';
import type { EngineFailuresRepository } from '../database.types';
import type {
  DbTimestamp,
  EngineFailureRecord,
  EngineName,
  NewEngineFailure,
} from '../entities';

type FailureRow = {
  id: string;
  engine: string;
  transaction_id: string | null;
  event_type: string;
  error_message: string;
  created_at: string;
  resolved_at: string | null;
};

const FAILURE_COLUMNS =
  'id, engine, transaction_id, event_type, error_message, created_at, resolved_at';

const toEngineName = (value: string): EngineName => {
  if (value === 'bonus' || value === 'discount') return value;
  throw new Error(`Unknown engine: ${value}`);
};

const toFailure = (row: FailureRow): EngineFailureRecord => ({
  id: row.id,
  engine: toEngineName(row.engine),
  transactionId: row.transaction_id,
  eventType: row.event_type,
  errorMessage: row.error_message,
  createdAt: row.created_at,
  resolvedAt: row.resolved_at,
});

export class PgEngineFailuresRepository implements EngineFailuresRepository {
  constructor(private readonly db: Queryable) {}

  async record(input: NewEngineFailure): Promise<EngineFailureRecord> {
    const res = await this.db.query<FailureRow>(
      `INSERT INTO engine_failures (engine, transaction_id, event_type, error_message)
       VALUES ($1, $2, $3, $4)
       RETURNING ${FAILURE_COLUMNS}`,
      [input.engine, input.transactionId, input.eventType, input.errorMessage],
    );
    return toFailure(res.rows[0]);
  }

  async listUnresolved(
    engine?: EngineName,
    limit = 100,
  ): Promise<EngineFailureRecord[]> {
    const res = await this.db.query<FailureRow>(
      `SELECT ${FAILURE_COLUMNS}
         FROM engine_failures
        WHERE resolved_at IS NULL
          AND ($1::text IS NULL OR engine = $1)
        ORDER BY id
        LIMIT $2`,
      [engine ?? null, limit],
    );
    return res.rows.map(toFailure);
  }

  async markResolved(id: string, resolvedAt?: DbTimestamp): Promise<void> {
    await this.db.query(
      `UPDATE engine_failures
          SET resolved_at = COALESCE($2::timestamp, NOW())
        WHERE id = $1`,
      [id, resolvedAt ?? null],
    );
  }

  async countUnresolved(): Promise<Map<EngineName, number>> {
    const res = await this.db.query<{ engine: string; open: number }>(
      `SELECT engine, COUNT(*)::int AS open
         FROM engine_failures
        WHERE resolved_at IS NULL
        GROUP BY engine`,
    );
    return new Map(res.rows.map((row) => [toEngineName(row.engine), row.open]));
  }
}
