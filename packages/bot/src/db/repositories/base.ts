import type { AppDatabase } from "../index";

/**
 * What a repository needs from its unit of work. Reading `db` through the
 * scope on every query means a repository kept past its transaction fails
 * loudly instead of writing through a connection it no longer owns.
 */
export interface RepositoryScope {
  readonly db: AppDatabase;
}
