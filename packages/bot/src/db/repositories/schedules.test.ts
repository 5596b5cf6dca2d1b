import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestSessions, type TestSessions } from "../../test-utils";
import { withUnitOfWork } from "../unit-of-work";
import { InvalidScheduleError } from "./schedules";

describe("SchedulesRepository", () => {
  let ctx: TestSessions;
  let plantId: number;

  beforeEach(async () => {
    ctx = await createTestSessions();
    plantId = await withUnitOfWork(ctx.sessions, async (uow) => {
      const user = await uow.users.ensure(1);
      return (await uow.plants.create({ userId: user.id, name: "Pilea" })).id;
    });
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  describe("create", () => {
    it("should create an interval schedule", async () => {
      const schedule = await withUnitOfWork(ctx.sessions, (uow) =>
        uow.schedules.create({ plantId, action: "WATERING", type: "INTERVAL", intervalDays: 3, localTime: "08:30" })
      );

      expect(schedule).toMatchObject({
        plantId,
        action: "WATERING",
        type: "INTERVAL",
        intervalDays: 3,
        weeklyMask: null,
        localTime: "08:30",
        active: true,
        customTitle: null,
        customNoteTemplate: null,
      });
    });

    it("should create a weekly schedule", async () => {
      const schedule = await withUnitOfWork(ctx.sessions, (uow) =>
        uow.schedules.create({ plantId, action: "FERTILIZING", type: "WEEKLY", weeklyMask: 0b0000101, localTime: "19:00" })
      );

      expect(schedule).toMatchObject({ type: "WEEKLY", weeklyMask: 5, intervalDays: null });
    });

    it("should keep custom fields only for custom actions", async () => {
      const [custom, watering] = await withUnitOfWork(ctx.sessions, async (uow) => [
        await uow.schedules.create({
          plantId,
          action: "CUSTOM",
          type: "INTERVAL",
          intervalDays: 14,
          localTime: "10:00",
          customTitle: "Mist leaves",
          customNoteTemplate: "Misted {plant}",
        }),
        await uow.schedules.create({
          plantId,
          action: "WATERING",
          type: "INTERVAL",
          intervalDays: 2,
          localTime: "10:00",
          customTitle: "ignored",
        }),
      ]);

      expect(custom).toMatchObject({ customTitle: "Mist leaves", customNoteTemplate: "Misted {plant}" });
      expect(watering).toMatchObject({ customTitle: null, customNoteTemplate: null });
    });

    it("should reject malformed times", async () => {
      await expect(
        withUnitOfWork(ctx.sessions, (uow) =>
          uow.schedules.create({ plantId, action: "WATERING", type: "INTERVAL", intervalDays: 1, localTime: "25:00" })
        )
      ).rejects.toThrow('Invalid local time "25:00", expected HH:MM');
    });

    it("should reject an interval below one day", async () => {
      await expect(
        withUnitOfWork(ctx.sessions, (uow) =>
          uow.schedules.create({ plantId, action: "WATERING", type: "INTERVAL", intervalDays: 0, localTime: "09:00" })
        )
      ).rejects.toBeInstanceOf(InvalidScheduleError);
    });

    it("should reject a weekly mask without a valid weekday", async () => {
      for (const weeklyMask of [0, 128, 1.5]) {
        await expect(
          withUnitOfWork(ctx.sessions, (uow) =>
            uow.schedules.create({ plantId, action: "WATERING", type: "WEEKLY", weeklyMask, localTime: "09:00" })
          )
        ).rejects.toBeInstanceOf(InvalidScheduleError);
      }
    });
  });

  it("should list active schedules and a plant's schedules newest first", async () => {
    const { ids, active, byPlant } = await withUnitOfWork(ctx.sessions, async (uow) => {
      const a = await uow.schedules.create({ plantId, action: "WATERING", type: "INTERVAL", intervalDays: 3, localTime: "08:00" });
      const b = await uow.schedules.create({ plantId, action: "REPOTTING", type: "INTERVAL", intervalDays: 365, localTime: "12:00" });
      const c = await uow.schedules.create({ plantId, action: "FERTILIZING", type: "WEEKLY", weeklyMask: 1, localTime: "18:00" });
      await uow.schedules.setActive(b.id, false);
      return {
        ids: [a.id, b.id, c.id],
        active: (await uow.schedules.listActive()).map((s) => s.id),
        byPlant: (await uow.schedules.listByPlant(plantId)).map((s) => s.id),
      };
    });

    expect(active).toEqual([ids[0], ids[2]]);
    expect(byPlant).toEqual([ids[2], ids[1], ids[0]]);
  });

  it("should toggle and delete schedules", async () => {
    const schedule = await withUnitOfWork(ctx.sessions, (uow) =>
      uow.schedules.create({ plantId, action: "WATERING", type: "INTERVAL", intervalDays: 3, localTime: "08:00" })
    );

    const paused = await withUnitOfWork(ctx.sessions, (uow) => uow.schedules.setActive(schedule.id, false));
    const deleted = await withUnitOfWork(ctx.sessions, (uow) => uow.schedules.delete(schedule.id));
    const missing = await withUnitOfWork(ctx.sessions, (uow) => uow.schedules.setActive(schedule.id, true));

    expect(paused?.active).toBe(false);
    expect(deleted).toBe(true);
    expect(missing).toBeUndefined();
  });
});
