import { loadRuntimeConfig } from '@fxconvert/config';
import { createServiceLogger } from '@fxconvert/observability';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import postgres from 'postgres';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const MIGRATION_DIR = path.resolve(__dirname, '../migrations');

const logger = createServiceLogger({ service: 'db-migrate' });

/** `.sql` files in apply order. */
export async function listMigrationFiles(migrationDir: string = MIGRATION_DIR): Promise<string[]> {
  return (await readdir(migrationDir)).filter((file) => file.endsWith('.sql')).sort((a, b) => a.localeCompare(b));
}

export async function runMigrations(databaseUrl: string, migrationDir: string = MIGRATION_DIR): Promise<string[]> {
  const sql = postgres(databaseUrl, {
    max: 1,
    idle_timeout: 5,
    connect_timeout: 10,
    prepare: false,
    onnotice: () => undefined
  });
  const applied: string[] = [];

  try {
    await sql.unsafe(`
      create table if not exists schema_migrations (
        version text primary key,
        applied_at timestamptz not null default now()
      )
    `);

    for (const filename of await listMigrationFiles(migrationDir)) {
      const alreadyApplied = await sql.unsafe('select 1 from schema_migrations where version = $1 limit 1', [filename]);

      if (alreadyApplied.length > 0) {
        continue;
      }

      const migrationSql = await readFile(path.join(migrationDir, filename), 'utf8');
      await sql.begin(async (transaction) => {
        await transaction.unsafe(migrationSql);
        await transaction.unsafe('insert into schema_migrations(version) values ($1)', [filename]);
      });
      applied.push(filename);
      logger.info('Applied migration', { filename });
    }

    logger.info('Migration run complete', { appliedCount: applied.length });
    return applied;
  } finally {
    await sql.end({ timeout: 5 });
  }
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  runMigrations(loadRuntimeConfig().DATABASE_URL).catch((error: unknown) => {
    logger.error('Migration run failed', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
}
