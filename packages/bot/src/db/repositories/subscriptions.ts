import { and, asc, eq } from "drizzle-orm";
import { scheduleSubscriptions, type ScheduleSubscription } from "../schema";
import type { RepositoryScope } from "./base";

export interface SubscribeOptions {
  canComplete?: boolean;
}

export class SubscriptionsRepository {
  constructor(private readonly scope: RepositoryScope) {}

  /** Subscribing twice returns the existing subscription unchanged. */
  async subscribe(scheduleId: number, subscriberUserId: number, options: SubscribeOptions = {}): Promise<ScheduleSubscription> {
    const [created] = await this.scope.db
      .insert(scheduleSubscriptions)
      .values({
        scheduleId,
        subscriberUserId,
        canComplete: options.canComplete ?? true,
        acceptedAt: new Date(),
      })
      .onConflictDoNothing({ target: [scheduleSubscriptions.scheduleId, scheduleSubscriptions.subscriberUserId] })
      .returning();
    if (created) return created;

    const [existing] = await this.scope.db
      .select()
      .from(scheduleSubscriptions)
      .where(this.match(scheduleId, subscriberUserId));
    return existing;
  }

  async unsubscribe(scheduleId: number, subscriberUserId: number): Promise<boolean> {
    const deleted = await this.scope.db
      .delete(scheduleSubscriptions)
      .where(this.match(scheduleId, subscriberUserId))
      .returning({ id: scheduleSubscriptions.id });
    return deleted.length > 0;
  }

  async setMuted(scheduleId: number, subscriberUserId: number, muted: boolean): Promise<ScheduleSubscription | undefined> {
    const [subscription] = await this.scope.db
      .update(scheduleSubscriptions)
      .set({ muted })
      .where(this.match(scheduleId, subscriberUserId))
      .returning();
    return subscription;
  }

  async listBySchedule(scheduleId: number): Promise<ScheduleSubscription[]> {
    return this.scope.db
      .select()
      .from(scheduleSubscriptions)
      .where(eq(scheduleSubscriptions.scheduleId, scheduleId))
      .orderBy(asc(scheduleSubscriptions.id));
  }

  private match(scheduleId: number, subscriberUserId: number) {
    return and(
      eq(scheduleSubscriptions.scheduleId, scheduleId),
      eq(scheduleSubscriptions.subscriberUserId, subscriberUserId)
    );
  }
}
