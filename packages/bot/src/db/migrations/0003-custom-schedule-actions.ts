import type { Migration } from "./types";
import { columnExists } from "./probes";

export const customScheduleActions: Migration = {
  version: 3,
  name: "custom_schedule_actions",
  up: `
    ALTER TABLE "schedules" ADD COLUMN "custom_title" TEXT;
    ALTER TABLE "schedules" ADD COLUMN "custom_note_template" TEXT;
  `,
  isApplied: (conn) =>
    columnExists(conn, "schedules", "custom_title") && columnExists(conn, "schedules", "custom_note_template"),
};
