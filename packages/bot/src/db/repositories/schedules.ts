import { and, asc, desc, eq } from "drizzle-orm";
import { plants, schedules, type ActionType, type NewSchedule, type Schedule, type ScheduleType } from "../schema";
import type { RepositoryScope } from "./base";

const LOCAL_TIME = /^([01]\d|2[0-3]):[0-5]\d$/;
const ALL_WEEKDAYS_MASK = 0b1111111;

export class InvalidScheduleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidScheduleError";
  }
}

interface ScheduleBase {
  plantId: number;
  action: ActionType;
  /** Wall-clock time in the owner's timezone, `HH:MM`. */
  localTime: string;
  active?: boolean;
  customTitle?: string | null;
  customNoteTemplate?: string | null;
}

export type CreateScheduleInput =
  | (ScheduleBase & { type: Extract<ScheduleType, "INTERVAL">; intervalDays: number })
  | (ScheduleBase & { type: Extract<ScheduleType, "WEEKLY">; weeklyMask: number });

export function parseLocalTime(value: string): { hour: number; minute: number } {
  if (!LOCAL_TIME.test(value)) {
    throw new InvalidScheduleError(`Invalid local time "${value}", expected HH:MM`);
  }
  const [hour, minute] = value.split(":").map(Number);
  return { hour, minute };
}

function validate(input: CreateScheduleInput): void {
  parseLocalTime(input.localTime);
  if (input.type === "INTERVAL") {
    if (!Number.isInteger(input.intervalDays) || input.intervalDays < 1) {
      throw new InvalidScheduleError(`Interval must be a whole number of days >= 1, got ${input.intervalDays}`);
    }
  } else if (!Number.isInteger(input.weeklyMask) || input.weeklyMask < 1 || input.weeklyMask > ALL_WEEKDAYS_MASK) {
    throw new InvalidScheduleError(`Weekly mask must pick at least one weekday, got ${input.weeklyMask}`);
  }
}

export class SchedulesRepository {
  constructor(private readonly scope: RepositoryScope) {}

  /** Always inserts; existing schedules for the same plant and action are left alone. */
  async create(input: CreateScheduleInput): Promise<Schedule> {
    validate(input);
    const custom = input.action === "CUSTOM";

    const newSchedule: NewSchedule = {
      plantId: input.plantId,
      action: input.action,
      type: input.type,
      intervalDays: input.type === "INTERVAL" ? input.intervalDays : null,
      weeklyMask: input.type === "WEEKLY" ? input.weeklyMask : null,
      localTime: input.localTime,
      active: input.active ?? true,
      customTitle: custom ? (input.customTitle ?? null) : null,
      customNoteTemplate: custom ? (input.customNoteTemplate ?? null) : null,
    };
    const [schedule] = await this.scope.db.insert(schedules).values(newSchedule).returning();
    return schedule;
  }

  async get(scheduleId: number): Promise<Schedule | undefined> {
    const [schedule] = await this.scope.db.select().from(schedules).where(eq(schedules.id, scheduleId));
    return schedule;
  }

  async listActive(): Promise<Schedule[]> {
    return this.scope.db.select().from(schedules).where(eq(schedules.active, true)).orderBy(asc(schedules.id));
  }

  /** Active schedules on any of the user's plants. */
  async listActiveByUser(userId: number): Promise<Schedule[]> {
    const rows = await this.scope.db
      .select({ schedule: schedules })
      .from(schedules)
      .innerJoin(plants, eq(plants.id, schedules.plantId))
      .where(and(eq(plants.userId, userId), eq(schedules.active, true)))
      .orderBy(asc(schedules.id));
    return rows.map((row) => row.schedule);
  }

  /** Newest first. */
  async listByPlant(plantId: number): Promise<Schedule[]> {
    return this.scope.db.select().from(schedules).where(eq(schedules.plantId, plantId)).orderBy(desc(schedules.id));
  }

  async setActive(scheduleId: number, active: boolean): Promise<Schedule | undefined> {
    const [schedule] = await this.scope.db
      .update(schedules)
      .set({ active })
      .where(eq(schedules.id, scheduleId))
      .returning();
    return schedule;
  }

  async delete(scheduleId: number): Promise<boolean> {
    const deleted = await this.scope.db
      .delete(schedules)
      .where(eq(schedules.id, scheduleId))
      .returning({ id: schedules.id });
    return deleted.length > 0;
  }
}
