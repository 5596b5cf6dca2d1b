import type { Migration } from "./types";
import { indexExists, tableExists } from "./probes";

export const actionLogs: Migration = {
  version: 2,
  name: "action_logs",
  up: `
    CREATE TABLE "action_logs" (
      "id" INTEGER PRIMARY KEY AUTOINCREMENT,
      "user_id" INTEGER NOT NULL,
      "plant_id" INTEGER,
      "schedule_id" INTEGER,
      "action" TEXT NOT NULL,
      "status" TEXT NOT NULL CHECK ("status" IN ('DONE', 'SKIPPED')),
      "source" TEXT DEFAULT 'SCHEDULE' NOT NULL CHECK ("source" IN ('SCHEDULE', 'MANUAL')),
      "done_at_utc" INTEGER NOT NULL,
      "plant_name_at_time" TEXT,
      "note" TEXT,
      FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE,
      FOREIGN KEY ("plant_id") REFERENCES "plants"("id") ON DELETE SET NULL,
      FOREIGN KEY ("schedule_id") REFERENCES "schedules"("id") ON DELETE SET NULL
    );

    CREATE INDEX "ix_action_logs_user_id" ON "action_logs" ("user_id");
    CREATE INDEX "ix_action_logs_plant_id" ON "action_logs" ("plant_id");
    CREATE INDEX "ix_action_logs_schedule_id" ON "action_logs" ("schedule_id");
  `,
  isApplied: (conn) =>
    tableExists(conn, "action_logs") &&
    ["ix_action_logs_user_id", "ix_action_logs_plant_id", "ix_action_logs_schedule_id"].every((index) =>
      indexExists(conn, index)
    ),
};
