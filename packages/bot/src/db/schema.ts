import { sqliteTable, text, integer, uniqueIndex } from "drizzle-orm/sqlite-core";

export const ACTION_TYPES = ["WATERING", "FERTILIZING", "REPOTTING", "CUSTOM"] as const;
export const SCHEDULE_TYPES = ["INTERVAL", "WEEKLY"] as const;
export const ACTION_STATUSES = ["DONE", "SKIPPED"] as const;
export const ACTION_SOURCES = ["SCHEDULE", "MANUAL"] as const;

export type ActionType = (typeof ACTION_TYPES)[number];
export type ScheduleType = (typeof SCHEDULE_TYPES)[number];
export type ActionStatus = (typeof ACTION_STATUSES)[number];
export type ActionSource = (typeof ACTION_SOURCES)[number];

export const users = sqliteTable("users", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  tgUserId: integer("tg_user_id").notNull().unique(),
  tgUsername: text("tg_username"),
  tz: text("tz").notNull().default("Europe/Amsterdam"),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

export const species = sqliteTable(
  "species",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    name: text("name").notNull(),
  },
  (table) => ({
    userName: uniqueIndex("uq_species_user_name").on(table.userId, table.name),
  })
);

export const plants = sqliteTable("plants", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  name: text("name").notNull(),
  speciesId: integer("species_id").references(() => species.id, { onDelete: "set null" }),
});

export const schedules = sqliteTable("schedules", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  plantId: integer("plant_id")
    .notNull()
    .references(() => plants.id, { onDelete: "cascade" }),
  action: text("action", { enum: ACTION_TYPES }).notNull(),
  type: text("type", { enum: SCHEDULE_TYPES }).notNull(),
  intervalDays: integer("interval_days"),
  // Bit 0 = Monday ... bit 6 = Sunday
  weeklyMask: integer("weekly_mask"),
  localTime: text("local_time").notNull(),
  active: integer("active", { mode: "boolean" }).notNull().default(true),
  customTitle: text("custom_title"),
  customNoteTemplate: text("custom_note_template"),
});

export const actionLogs = sqliteTable("action_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  plantId: integer("plant_id").references(() => plants.id, { onDelete: "set null" }),
  scheduleId: integer("schedule_id").references(() => schedules.id, { onDelete: "set null" }),
  action: text("action", { enum: ACTION_TYPES }).notNull(),
  status: text("status", { enum: ACTION_STATUSES }).notNull(),
  source: text("source", { enum: ACTION_SOURCES }).notNull().default("SCHEDULE"),
  doneAt: integer("done_at_utc", { mode: "timestamp" }).notNull(),
  plantNameAtTime: text("plant_name_at_time"),
  note: text("note"),
});

export const scheduleSubscriptions = sqliteTable(
  "schedule_subscriptions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    scheduleId: integer("schedule_id")
      .notNull()
      .references(() => schedules.id, { onDelete: "cascade" }),
    subscriberUserId: integer("subscriber_user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    canComplete: integer("can_complete", { mode: "boolean" }).notNull().default(true),
    muted: integer("muted", { mode: "boolean" }).notNull().default(false),
    acceptedAt: integer("accepted_at_utc", { mode: "timestamp" }).notNull(),
  },
  (table) => ({
    scheduleSubscriber: uniqueIndex("uq_schedule_subscriber").on(table.scheduleId, table.subscriberUserId),
  })
);

// Export types for convenience
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Species = typeof species.$inferSelect;
export type Plant = typeof plants.$inferSelect;
export type NewPlant = typeof plants.$inferInsert;
export type Schedule = typeof schedules.$inferSelect;
export type NewSchedule = typeof schedules.$inferInsert;
export type ActionLog = typeof actionLogs.$inferSelect;
export type NewActionLog = typeof actionLogs.$inferInsert;
export type ScheduleSubscription = typeof scheduleSubscriptions.$inferSelect;
