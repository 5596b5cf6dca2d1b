/**
 * Schedule planner
 *
 * Works out when each care schedule next comes due, in UTC, from the owner's
 * timezone and the schedule's last DONE or SKIPPED entry.
 */

import { InvalidScheduleError, parseLocalTime } from "../db/repositories/schedules";
import type { ActionSource, ActionType, Schedule, User } from "../db/schema";
import type { UnitOfWork } from "../db/unit-of-work";
import { errorMessage } from "../lib/errors";
import { silentLogger, type Logger } from "../lib/logger";
import {
  addDays,
  daysBetween,
  localDateOf,
  resolveTimezone,
  toLocal,
  weekdayOf,
  zonedToUtc,
  type LocalDate,
  type LocalDateTime,
} from "../lib/timezone";

export type PlannableSchedule = Pick<Schedule, "type" | "intervalDays" | "weeklyMask" | "localTime">;

export interface LastDone {
  doneAt: Date;
  source: ActionSource;
}

export interface NextRun {
  scheduleId: number;
  plantId: number;
  action: ActionType;
  runAt: Date;
  /** `runAt` on the owner's wall clock. */
  local: LocalDateTime;
  tz: string;
}

export interface PlanOptions {
  now?: Date;
  limit?: number;
  action?: ActionType;
  logger?: Logger;
}

const WEEK_SEARCH_DAYS = 14;

/**
 * Next run strictly after `now`.
 *
 * INTERVAL: every `intervalDays` days at `localTime`, counted from the day of
 * the last entry, or from today when there is none.
 *
 * WEEKLY: the first day picked by `weeklyMask` (bit 0 = Monday) whose slot is
 * still ahead. A manual entry made after the previous slot covers the next
 * one. An empty mask falls back to tomorrow.
 */
export function nextRunUtc(
  schedule: PlannableSchedule,
  timezone: string,
  lastDone: LastDone | undefined,
  now: Date
): Date {
  const tz = resolveTimezone(timezone);
  const { hour, minute } = parseLocalTime(schedule.localTime);
  const at = (date: LocalDate): Date => zonedToUtc(date, hour, minute, tz);
  const today = localDateOf(now, tz);

  if (schedule.type === "INTERVAL") {
    const step = Math.max(1, schedule.intervalDays ?? 1);
    let date = lastDone ? addDays(localDateOf(lastDone.doneAt, tz), step) : today;

    const lag = daysBetween(date, today);
    if (lag > 0) {
      date = addDays(date, Math.floor(lag / step) * step);
    }
    while (at(date).getTime() <= now.getTime()) {
      date = addDays(date, step);
    }
    return at(date);
  }

  const mask = schedule.weeklyMask ?? 0;
  const hits = (date: LocalDate): boolean => (mask & (1 << weekdayOf(date))) !== 0;
  if ((mask & 0b1111111) === 0) {
    return at(addDays(today, 1));
  }

  const nextAfter = (ref: Date): Date => {
    const from = localDateOf(ref, tz);
    for (let d = 0; d < WEEK_SEARCH_DAYS; d++) {
      const date = addDays(from, d);
      if (hits(date) && at(date).getTime() > ref.getTime()) return at(date);
    }
    return at(addDays(from, 7));
  };

  const next = nextAfter(now);
  if (lastDone?.source === "MANUAL") {
    const previous = previousSlot(now, tz, hits, at);
    const doneAt = lastDone.doneAt.getTime();
    if (previous && previous.getTime() < doneAt && doneAt < next.getTime()) {
      return nextAfter(next);
    }
  }
  return next;
}

function previousSlot(
  ref: Date,
  tz: string,
  hits: (date: LocalDate) => boolean,
  at: (date: LocalDate) => Date
): Date | undefined {
  const from = localDateOf(ref, tz);
  for (let d = 0; d < WEEK_SEARCH_DAYS; d++) {
    const date = addDays(from, -d);
    if (hits(date) && at(date).getTime() <= ref.getTime()) return at(date);
  }
  return undefined;
}

/**
 * Upcoming runs of the user's active schedules, soonest first.
 * Schedules whose stored time cannot be read are skipped and logged.
 */
export async function planNextRuns(uow: UnitOfWork, user: User, options: PlanOptions = {}): Promise<NextRun[]> {
  const now = options.now ?? new Date();
  const logger = options.logger ?? silentLogger;
  const tz = resolveTimezone(user.tz);

  const schedules = await uow.schedules.listActiveByUser(user.id);
  const runs: NextRun[] = [];

  for (const schedule of schedules) {
    if (options.action && schedule.action !== options.action) continue;

    const last = await uow.actionLogs.lastForSchedule(schedule.id);
    let runAt: Date;
    try {
      runAt = nextRunUtc(schedule, tz, last ? { doneAt: last.doneAt, source: last.source } : undefined, now);
    } catch (error) {
      if (!(error instanceof InvalidScheduleError)) throw error;
      logger.warn(`Skipping schedule ${schedule.id}`, { error: errorMessage(error) });
      continue;
    }

    runs.push({
      scheduleId: schedule.id,
      plantId: schedule.plantId,
      action: schedule.action,
      runAt,
      local: toLocal(runAt, tz),
      tz,
    });
  }

  runs.sort((a, b) => a.runAt.getTime() - b.runAt.getTime() || a.scheduleId - b.scheduleId);
  return runs.slice(0, options.limit ?? 50);
}
