import { and, asc, eq } from "drizzle-orm";
import { species, type Species } from "../schema";
import type { RepositoryScope } from "./base";

export class SpeciesRepository {
  constructor(private readonly scope: RepositoryScope) {}

  /** Names are unique per user; surrounding whitespace is not significant. */
  async getOrCreate(userId: number, name: string): Promise<Species> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new RangeError("Species name must not be empty");
    }

    const [created] = await this.scope.db
      .insert(species)
      .values({ userId, name: trimmed })
      .onConflictDoNothing({ target: [species.userId, species.name] })
      .returning();
    if (created) return created;

    const [existing] = await this.scope.db
      .select()
      .from(species)
      .where(and(eq(species.userId, userId), eq(species.name, trimmed)));
    return existing;
  }

  async listByUser(userId: number): Promise<Species[]> {
    return this.scope.db.select().from(species).where(eq(species.userId, userId)).orderBy(asc(species.name));
  }
}
