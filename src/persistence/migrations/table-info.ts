import type { Database as BetterSqlite3Database } from 'better-sqlite3'

/**
 * Whether `table` already has `column`. SQLite has no ADD COLUMN IF NOT
 * EXISTS, so additive migrations check PRAGMA table_info first.
 */
export function hasColumn(db: BetterSqlite3Database, table: string, column: string): boolean {
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all()
  return columns.some((c) => c.name === column)
}
