/**
 * Schema probes used by revisions to detect their own effect.
 */

import type { RawConnection } from "../index";

export function tableExists(conn: RawConnection, table: string): boolean {
  const row = conn
    .prepare("SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

export function indexExists(conn: RawConnection, index: string): boolean {
  const row = conn
    .prepare("SELECT 1 AS found FROM sqlite_master WHERE type = 'index' AND name = ?")
    .get(index);
  return row !== undefined;
}

export function columnExists(conn: RawConnection, table: string, column: string): boolean {
  const row = conn
    .prepare("SELECT 1 AS found FROM pragma_table_info(?) WHERE name = ?")
    .get(table, column);
  return row !== undefined;
}
