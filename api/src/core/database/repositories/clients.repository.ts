import type { Queryable } from '../pg.service';
import type { ClientsRepository } from '../database.types';
import type { ClientRecord, NewClient } from '../entities';
import { parseMinorUnits } from '../../../shared/money.util';

type ClientRow = {
  client_id: string;
  firstname: string | null;
  lastname: string | null;
  phone: string | null;
  bonus: string | null;
  created_at: string;
  updated_at: string;
};

const CLIENT_COLUMNS =
  'client_id, firstname, lastname, phone, bonus, created_at, updated_at';

const toClient = (row: ClientRow): ClientRecord => ({
  clientId: row.client_id,
  firstname: row.firstname,
  lastname: row.lastname,
  phone: row.phone,
  bonus: parseMinorUnits(row.bonus),
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgClientsRepository implements ClientsRepository {
  constructor(private readonly db: Queryable) {}

  async findById(clientId: string): Promise<ClientRecord | null> {
    const res = await this.db.query<ClientRow>(
      `SELECT ${CLIENT_COLUMNS} FROM clients WHERE client_id = $1`,
      [clientId],
    );
    return res.rows[0] ? toClient(res.rows[0]) : null;
  }

  async upsert(input: NewClient): Promise<ClientRecord> {
    const res = await this.db.query<ClientRow>(
      `INSERT INTO clients (client_id, firstname, lastname, phone)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (client_id) DO UPDATE SET
         firstname = COALESCE(EXCLUDED.firstname, clients.firstname),
         lastname = COALESCE(EXCLUDED.lastname, clients.lastname),
         phone = COALESCE(EXCLUDED.phone, clients.phone),
         updated_at = NOW()
       RETURNING ${CLIENT_COLUMNS}`,
      [
        input.clientId,
        input.firstname ?? null,
        input.lastname ?? null,
        input.phone ?? null,
      ],
    );
    return toClient(res.rows[0]);
  }

  async lockBalance(clientId: string): Promise<number | null> {
    const res = await this.db.query<{ bonus: string | null }>(
      'SELECT bonus FROM clients WHERE client_id = $1 FOR UPDATE',
      [clientId],
    );
    const row = res.rows[0];
    return row ? parseMinorUnits(row.bonus) : null;
  }

  async compareAndSetBalance(
    clientId: string,
    expected: number,
    next: number,
  ): Promise<boolean> {
    const res = await this.db.query(
      `UPDATE clients
          SET bonus = $3, updated_at = NOW()
        WHERE client_id = $1 AND COALESCE(bonus, 0) = $2`,
      [clientId, expected, next],
    );
    return (res.rowCount ?? 0) === 1;
  }

  async resetAllBalances(): Promise<number> {
    const res = await this.db.query('UPDATE clients SET bonus = 0');
    return res.rowCount ?? 0;
  }

  async listBalances(
    clientIds?: readonly string[],
  ): Promise<Array<Pick<ClientRecord, 'clientId' | 'bonus'>>> {
    const res = clientIds
      ? await this.db.query<Pick<ClientRow, 'client_id' | 'bonus'>>(
          `SELECT client_id, bonus FROM clients
            WHERE client_id = ANY($1::bigint[])
            ORDER BY client_id`,
          [[...clientIds]],
        )
      : await this.db.query<Pick<ClientRow, 'client_id' | 'bonus'>>(
          'SELECT client_id, bonus FROM clients ORDER BY client_id',
        );
    return res.rows.map((row) => ({
      clientId: row.client_id,
      bonus: parseMinorUnits(row.bonus),
    }));
  }
}
