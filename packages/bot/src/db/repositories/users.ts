import { eq } from "drizzle-orm";
import { isValidTimezone } from "../../lib/config";
import { users, type NewUser, type User } from "../schema";
import type { RepositoryScope } from "./base";

export interface CreateUserInput {
  tgUserId: number;
  tgUsername?: string | null;
  tz?: string;
}

export class UsersRepository {
  constructor(
    private readonly scope: RepositoryScope,
    private readonly defaultTimezone = "Europe/Amsterdam"
  ) {}

  async getByTelegramId(tgUserId: number): Promise<User | undefined> {
    const [user] = await this.scope.db.select().from(users).where(eq(users.tgUserId, tgUserId));
    return user;
  }

  async create(input: CreateUserInput): Promise<User> {
    const tz = input.tz ?? this.defaultTimezone;
    if (!isValidTimezone(tz)) {
      throw new RangeError(`Unknown timezone: ${tz}`);
    }

    const newUser: NewUser = {
      tgUserId: input.tgUserId,
      tgUsername: input.tgUsername ?? null,
      tz,
      createdAt: new Date(),
    };
    const [user] = await this.scope.db.insert(users).values(newUser).returning();
    return user;
  }

  /**
   * Get-or-create by Telegram id. A changed username is written back; an
   * absent one leaves the stored value alone.
   */
  async ensure(tgUserId: number, tgUsername?: string | null): Promise<User> {
    const existing = await this.getByTelegramId(tgUserId);
    if (existing) {
      if (tgUsername != null && existing.tgUsername !== tgUsername) {
        const [updated] = await this.scope.db
          .update(users)
          .set({ tgUsername })
          .where(eq(users.id, existing.id))
          .returning();
        return updated;
      }
      return existing;
    }

    // Another unit of work may have inserted the same user since the read
    const [created] = await this.scope.db
      .insert(users)
      .values({ tgUserId, tgUsername: tgUsername ?? null, tz: this.defaultTimezone, createdAt: new Date() })
      .onConflictDoNothing({ target: users.tgUserId })
      .returning();
    if (created) return created;

    const [raced] = await this.scope.db.select().from(users).where(eq(users.tgUserId, tgUserId));
    return raced;
  }

  async setTimezone(userId: number, tz: string): Promise<User | undefined> {
    if (!isValidTimezone(tz)) {
      throw new RangeError(`Unknown timezone: ${tz}`);
    }
    const [user] = await this.scope.db.update(users).set({ tz }).where(eq(users.id, userId)).returning();
    return user;
  }
}
