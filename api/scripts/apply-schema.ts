import { readdir, readFile } from 'fs/promises';
import * as path from 'path';
import { Client } from 'pg';

// Applies api/sql/*.sql in name order. Every file is idempotent.
async function main() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) throw new Error('DATABASE_URL is not set');
  const dir = process.env.SCHEMA_DIR ?? path.resolve(process.cwd(), 'api', 'sql');
  const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
  if (!files.length) throw new Error(`No .sql files in ${dir}`);

  const client = new Client({ connectionString });
  await client.connect();
  try {
    for (const file of files) {
      const sql = await readFile(path.join(dir, file), 'utf8');
      console.log(`Applying ${file}`);
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }
  } finally {
    await client.end();
  }
  console.log(`Applied ${files.length} file(s)`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
