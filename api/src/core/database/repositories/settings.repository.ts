import type { Queryable } from '../pg.service';
import type { SettingsRepository } from '../database.types';
import type { SettingRecord } from '../entities';

type SettingRow = {
  key: string;
  value: string;
  description: string | null;
  created_at: string;
  updated_at: string;
};

export class PgSettingsRepository implements SettingsRepository {
  constructor(private readonly db: Queryable) {}

  async get(key: string): Promise<SettingRecord | null> {
    const res = await this.db.query<SettingRow>(
      `SELECT key, value, description, created_at, updated_at
         FROM system_settings
        WHERE key = $1`,
      [key],
    );
    const row = res.rows[0];
    if (!row) return null;
    return {
      key: row.key,
      value: row.value,
      description: row.description,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async getMany(keys: readonly string[]): Promise<Map<string, string>> {
    const res = await this.db.query<Pick<SettingRow, 'key' | 'value'>>(
      'SELECT key, value FROM system_settings WHERE key = ANY($1::text[])',
      [[...keys]],
    );
    return new Map(res.rows.map((row) => [row.key, row.value]));
  }

  async upsert(
    key: string,
    value: string,
    description: string | null,
  ): Promise<void> {
    await this.db.query(
      `INSERT INTO system_settings (key, value, description)
       VALUES ($1, $2, $3)
       ON CONFLICT (key) DO UPDATE SET
         value = EXCLUDED.value,
         description = COALESCE(EXCLUDED.description, system_settings.description),
         updated_at = NOW()`,
      [key, value, description],
    );
  }

  async delete(key: string): Promise<boolean> {
    const res = await this.db.query(
      'DELETE FROM system_settings WHERE key = $1',
      [key],
    );
    return (res.rowCount ?? 0) > 0;
  }
}
