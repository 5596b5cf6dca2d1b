import type { Migration } from "./types";
import { indexExists } from "./probes";

export const lookupIndexes: Migration = {
  version: 6,
  name: "lookup_indexes",
  up: `
    CREATE INDEX "ix_plants_user_id" ON "plants" ("user_id");
    CREATE INDEX "ix_schedules_plant_id" ON "schedules" ("plant_id");
    CREATE INDEX "ix_schedules_active" ON "schedules" ("active");
  `,
  isApplied: (conn) =>
    indexExists(conn, "ix_plants_user_id") &&
    indexExists(conn, "ix_schedules_plant_id") &&
    indexExists(conn, "ix_schedules_active"),
};
