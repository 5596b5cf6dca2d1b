import type { Migration } from "./types";
import { indexExists, tableExists } from "./probes";

export const initial: Migration = {
  version: 1,
  name: "initial",
  up: `
    CREATE TABLE "users" (
      "id" INTEGER PRIMARY KEY AUTOINCREMENT,
      "tg_user_id" INTEGER NOT NULL UNIQUE,
      "tz" TEXT DEFAULT 'Europe/Amsterdam' NOT NULL,
      "created_at" INTEGER NOT NULL
    );

    CREATE TABLE "species" (
      "id" INTEGER PRIMARY KEY AUTOINCREMENT,
      "user_id" INTEGER NOT NULL,
      "name" TEXT NOT NULL,
      FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE
    );

    CREATE UNIQUE INDEX "uq_species_user_name" ON "species" ("user_id", "name");

    CREATE TABLE "plants" (
      "id" INTEGER PRIMARY KEY AUTOINCREMENT,
      "user_id" INTEGER NOT NULL,
      "name" TEXT NOT NULL,
      "species_id" INTEGER,
      FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE,
      FOREIGN KEY ("species_id") REFERENCES "species"("id") ON DELETE SET NULL
    );

    CREATE TABLE "schedules" (
      "id" INTEGER PRIMARY KEY AUTOINCREMENT,
      "plant_id" INTEGER NOT NULL,
      "action" TEXT NOT NULL,
      "type" TEXT NOT NULL CHECK ("type" IN ('INTERVAL', 'WEEKLY')),
      "interval_days" INTEGER,
      "weekly_mask" INTEGER,
      "local_time" TEXT NOT NULL,
      "active" INTEGER DEFAULT 1 NOT NULL,
      FOREIGN KEY ("plant_id") REFERENCES "plants"("id") ON DELETE CASCADE
    );
  `,
  isApplied: (conn) =>
    ["users", "species", "plants", "schedules"].every((table) => tableExists(conn, table)) &&
    indexExists(conn, "uq_species_user_name"),
};
