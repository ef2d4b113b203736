/**
 * Apply database migrations to Supabase
 * Usage: npm run migrate
 *
 * Requires an exec_sql(sql text) function on the target project; without it
 * paste the files from supabase/migrations into the SQL editor instead.
 */

import 'dotenv/config';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { createSupabaseAdmin } from '../src/lib/supabase.js';
import { createLogger } from '../src/lib/logger.js';

const log = createLogger(process.env.LOG_LEVEL ?? 'info');

const SUPABASE_URL = process.env.SUPABASE_URL;
const SUPABASE_SERVICE_KEY = process.env.SUPABASE_SERVICE_KEY;

if (!SUPABASE_URL || !SUPABASE_SERVICE_KEY) {
  log.fatal('Missing SUPABASE_URL or SUPABASE_SERVICE_KEY');
  process.exit(1);
}

const supabase = createSupabaseAdmin(SUPABASE_URL, SUPABASE_SERVICE_KEY);
const migrationsDir = join(process.cwd(), 'supabase/migrations');

async function applyMigration(filename: string): Promise<void> {
  const sql = readFileSync(join(migrationsDir, filename), 'utf-8');

  log.info({ migration: filename }, 'Applying migration');

  // Functions contain semicolons, so each file is sent whole
  const { error } = await supabase.rpc('exec_sql', { sql });
  if (error) {
    throw new Error(`${filename}: ${error.message}`);
  }

  log.info({ migration: filename }, 'Migration completed');
}

async function main(): Promise<void> {
  const files = readdirSync(migrationsDir)
    .filter((name) => name.endsWith('.sql'))
    .sort();

  for (const file of files) {
    await applyMigration(file);
  }
  log.info({ count: files.length }, 'All migrations applied successfully');
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'Migration failed');
  process.exit(1);
});
