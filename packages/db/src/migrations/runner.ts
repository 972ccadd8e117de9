import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import type postgres from "postgres";

// <package>/migrations, next to src/
const MIGRATIONS_DIR = fileURLToPath(new URL("../../migrations", import.meta.url));

async function ensureHistoryTable(sql: postgres.Sql): Promise<void> {
  await sql.unsafe(`
    create table if not exists schema_migration_history (
      migration_name text primary key,
      applied_at timestamptz not null default now()
    )
  `);
}

// Applies every pending .sql file in name order, once
export async function runMigrations(
  sql: postgres.Sql,
  migrationsDir = MIGRATIONS_DIR,
): Promise<string[]> {
  await ensureHistoryTable(sql);

  const appliedRows = await sql<{ migration_name: string }[]>`
    select migration_name from schema_migration_history
  `;
  const applied = new Set(appliedRows.map((row) => row.migration_name));
  const migrationFiles = (await readdir(migrationsDir))
    .filter((fileName) => fileName.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  const newlyApplied: string[] = [];
  for (const fileName of migrationFiles) {
    if (applied.has(fileName)) {
      continue;
    }
    const sqlText = await readFile(join(migrationsDir, fileName), "utf-8");
    await sql.begin(async (tx) => {
      if (sqlText.trim().length > 0) {
        await tx.unsafe(sqlText);
      }
      await tx.unsafe("insert into schema_migration_history (migration_name) values ($1)", [
        fileName,
      ]);
    });
    console.log(`[migrate] Applied ${fileName}`);
    newlyApplied.push(fileName);
  }
  return newlyApplied;
}
