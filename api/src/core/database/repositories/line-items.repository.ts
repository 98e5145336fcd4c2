import type { Queryable } from '../pg.service';
import type { LineItemsRepository } from '../database.types';
import type { LineItemPatch, LineItemRecord, NewLineItem } from '../entities';

type LineItemRow = {
  id: string;
  transaction_id: string;
  product_id: string | null;
  num: string;
  sum: string;
  created_at: string;
  updated_at: string;
};

const LINE_ITEM_COLUMNS =
  'id, transaction_id, product_id, num, sum, created_at, updated_at';

const toLineItem = (row: LineItemRow): LineItemRecord => ({
  id: row.id,
  transactionId: row.transaction_id,
  productId: row.product_id,
  quantity: row.num,
  sum: row.sum,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgLineItemsRepository implements LineItemsRepository {
  constructor(private readonly db: Queryable) {}

  async insert(input: NewLineItem): Promise<LineItemRecord> {
    const res = await this.db.query<LineItemRow>(
      `INSERT INTO transaction_products (transaction_id, product_id, num, sum)
       VALUES ($1, $2, COALESCE($3::numeric, 1), $4)
       RETURNING ${LINE_ITEM_COLUMNS}`,
      [
        input.transactionId,
        input.productId ?? null,
        input.quantity ?? null,
        input.sum,
      ],
    );
    return toLineItem(res.rows[0]);
  }

  async update(
    id: string,
    patch: LineItemPatch,
  ): Promise<LineItemRecord | null> {
    const res = await this.db.query<LineItemRow>(
      `UPDATE transaction_products
          SET product_id = CASE WHEN $2::boolean THEN $3 ELSE product_id END,
              num = COALESCE($4::numeric, num),
              sum = COALESCE($5::numeric, sum),
              updated_at = NOW()
        WHERE id = $1
        RETURNING ${LINE_ITEM_COLUMNS}`,
      [
        id,
        patch.productId !== undefined,
        patch.productId ?? null,
        patch.quantity ?? null,
        patch.sum ?? null,
      ],
    );
    return res.rows[0] ? toLineItem(res.rows[0]) : null;
  }

  async delete(id: string): Promise<LineItemRecord | null> {
    const res = await this.db.query<LineItemRow>(
      `DELETE FROM transaction_products WHERE id = $1
       RETURNING ${LINE_ITEM_COLUMNS}`,
      [id],
    );
    return res.rows[0] ? toLineItem(res.rows[0]) : null;
  }

  async totalForTransaction(
    transactionId: string,
  ): Promise<{ itemCount: number; total: string }> {
    const res = await this.db.query<{ item_count: number; total: string }>(
      `SELECT COUNT(*)::int AS item_count,
              COALESCE(SUM(sum), 0)::text AS total
         FROM transaction_products
        WHERE transaction_id = $1`,
      [transactionId],
    );
    const row = res.rows[0];
    return { itemCount: row?.item_count ?? 0, total: row?.total ?? '0' };
  }
}
