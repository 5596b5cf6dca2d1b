import type { RawConnection } from "../index";

/**
 * One revision of the schema history.
 *
 * `isApplied` is the revision's idempotence probe: it inspects the store and
 * reports whether the revision's effect is already present. The migrator uses
 * it to complete the bookkeeping of a revision that was interrupted between
 * taking effect and being recorded, instead of running it twice.
 */
export interface Migration {
  version: number;
  name: string;
  up: string | ((conn: RawConnection) => void);
  /**
   * Revisions that cannot run inside a transaction (VACUUM, journal changes)
   * set this to false; they are journaled as `pending` while they run.
   */
  transactional?: boolean;
  isApplied?: (conn: RawConnection) => boolean;
}

export type MigrationStepStatus = "applied" | "skipped" | "recovered";

export interface MigrationStep {
  version: number;
  name: string;
  status: MigrationStepStatus;
  durationMs: number;
}

export interface MigrationHistoryRow {
  version: number;
  name: string;
  checksum: string;
  status: "pending" | "applied";
  started_at: number;
  applied_at: number | null;
  duration_ms: number | null;
}
