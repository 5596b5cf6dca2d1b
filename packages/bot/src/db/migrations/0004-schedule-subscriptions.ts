import type { Migration } from "./types";
import { indexExists, tableExists } from "./probes";

export const scheduleSubscriptions: Migration = {
  version: 4,
  name: "schedule_subscriptions",
  up: `
    CREATE TABLE "schedule_subscriptions" (
      "id" INTEGER PRIMARY KEY AUTOINCREMENT,
      "schedule_id" INTEGER NOT NULL,
      "subscriber_user_id" INTEGER NOT NULL,
      "can_complete" INTEGER DEFAULT 1 NOT NULL,
      "muted" INTEGER DEFAULT 0 NOT NULL,
      "accepted_at_utc" INTEGER NOT NULL,
      FOREIGN KEY ("schedule_id") REFERENCES "schedules"("id") ON DELETE CASCADE,
      FOREIGN KEY ("subscriber_user_id") REFERENCES "users"("id") ON DELETE CASCADE
    );

    CREATE UNIQUE INDEX "uq_schedule_subscriber" ON "schedule_subscriptions" ("schedule_id", "subscriber_user_id");
    CREATE INDEX "ix_schedule_subscriptions_subscriber" ON "schedule_subscriptions" ("subscriber_user_id");
  `,
  isApplied: (conn) =>
    tableExists(conn, "schedule_subscriptions") &&
    indexExists(conn, "uq_schedule_subscriber") &&
    indexExists(conn, "ix_schedule_subscriptions_subscriber"),
};
