import { asc, eq } from "drizzle-orm";
import { plants, type NewPlant, type Plant } from "../schema";
import type { RepositoryScope } from "./base";

export interface CreatePlantInput {
  userId: number;
  name: string;
  speciesId?: number | null;
}

function plantName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new RangeError("Plant name must not be empty");
  }
  return trimmed;
}

export class PlantsRepository {
  constructor(private readonly scope: RepositoryScope) {}

  async create(input: CreatePlantInput): Promise<Plant> {
    const newPlant: NewPlant = { userId: input.userId, name: plantName(input.name), speciesId: input.speciesId ?? null };
    const [plant] = await this.scope.db.insert(plants).values(newPlant).returning();
    return plant;
  }

  async get(plantId: number): Promise<Plant | undefined> {
    const [plant] = await this.scope.db.select().from(plants).where(eq(plants.id, plantId));
    return plant;
  }

  async listByUser(userId: number): Promise<Plant[]> {
    return this.scope.db.select().from(plants).where(eq(plants.userId, userId)).orderBy(asc(plants.id));
  }

  async rename(plantId: number, name: string): Promise<Plant | undefined> {
    const [plant] = await this.scope.db
      .update(plants)
      .set({ name: plantName(name) })
      .where(eq(plants.id, plantId))
      .returning();
    return plant;
  }

  /** Schedules go with the plant; action logs keep their plant name snapshot. */
  async delete(plantId: number): Promise<boolean> {
    const deleted = await this.scope.db.delete(plants).where(eq(plants.id, plantId)).returning({ id: plants.id });
    return deleted.length > 0;
  }
}
