import type { Migration } from "./types";
import { initial } from "./0001-initial";
import { actionLogs } from "./0002-action-logs";
import { customScheduleActions } from "./0003-custom-schedule-actions";
import { scheduleSubscriptions } from "./0004-schedule-subscriptions";
import { usersTgUsername } from "./0005-users-tg-username";
import { lookupIndexes } from "./0006-lookup-indexes";

/** The schema history, oldest first. */
export const MIGRATIONS: readonly Migration[] = [
  initial,
  actionLogs,
  customScheduleActions,
  scheduleSubscriptions,
  usersTgUsername,
  lookupIndexes,
];

export type { Migration, MigrationStep, MigrationStepStatus, MigrationHistoryRow } from "./types";
