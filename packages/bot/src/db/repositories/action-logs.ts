import { and, desc, eq, gte, lt } from "drizzle-orm";
import {
  actionLogs,
  type ActionLog,
  type ActionSource,
  type ActionStatus,
  type ActionType,
  type NewActionLog,
} from "../schema";
import type { RepositoryScope } from "./base";

export interface CreateActionLogInput {
  userId: number;
  action: ActionType;
  status: ActionStatus;
  source?: ActionSource;
  plantId?: number | null;
  scheduleId?: number | null;
  doneAt?: Date;
  plantNameAtTime?: string | null;
  note?: string | null;
}

export interface ActionLogFilters {
  action?: ActionType;
  status?: ActionStatus;
  /** Inclusive lower bound on `doneAt`. */
  since?: Date;
  /** Exclusive upper bound on `doneAt`. */
  until?: Date;
  limit?: number;
  offset?: number;
}

export class ActionLogsRepository {
  constructor(private readonly scope: RepositoryScope) {}

  async create(input: CreateActionLogInput): Promise<ActionLog> {
    const newLog: NewActionLog = {
      userId: input.userId,
      plantId: input.plantId ?? null,
      scheduleId: input.scheduleId ?? null,
      action: input.action,
      status: input.status,
      source: input.source ?? "SCHEDULE",
      doneAt: input.doneAt ?? new Date(),
      plantNameAtTime: input.plantNameAtTime ?? null,
      note: input.note ?? null,
    };
    const [log] = await this.scope.db.insert(actionLogs).values(newLog).returning();
    return log;
  }

  /** Newest first. */
  async listByUser(userId: number, filters: ActionLogFilters = {}): Promise<ActionLog[]> {
    const conditions = and(
      eq(actionLogs.userId, userId),
      filters.action ? eq(actionLogs.action, filters.action) : undefined,
      filters.status ? eq(actionLogs.status, filters.status) : undefined,
      filters.since ? gte(actionLogs.doneAt, filters.since) : undefined,
      filters.until ? lt(actionLogs.doneAt, filters.until) : undefined
    );

    return this.scope.db
      .select()
      .from(actionLogs)
      .where(conditions)
      .orderBy(desc(actionLogs.doneAt), desc(actionLogs.id))
      .limit(filters.limit ?? 50)
      .offset(filters.offset ?? 0);
  }

  /** The latest DONE or SKIPPED entry for a schedule; either one resets its cycle. */
  async lastForSchedule(scheduleId: number): Promise<ActionLog | undefined> {
    const [log] = await this.scope.db
      .select()
      .from(actionLogs)
      .where(eq(actionLogs.scheduleId, scheduleId))
      .orderBy(desc(actionLogs.doneAt), desc(actionLogs.id))
      .limit(1);
    return log;
  }

  async listByPlant(plantId: number, limit = 50): Promise<ActionLog[]> {
    return this.scope.db
      .select()
      .from(actionLogs)
      .where(eq(actionLogs.plantId, plantId))
      .orderBy(desc(actionLogs.doneAt), desc(actionLogs.id))
      .limit(limit);
  }
}
