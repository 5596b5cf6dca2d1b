import type { Migration } from "./types";
import { columnExists } from "./probes";

export const usersTgUsername: Migration = {
  version: 5,
  name: "users_tg_username",
  up: `ALTER TABLE "users" ADD COLUMN "tg_username" TEXT;`,
  isApplied: (conn) => columnExists(conn, "users", "tg_username"),
};
