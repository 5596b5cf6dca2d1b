/**
 * Unit of Work
 *
 * One transaction, one set of repositories. The repositories are bound to the
 * transaction scope and stop working once it commits or rolls back.
 */

import { ActionLogsRepository } from "./repositories/action-logs";
import { PlantsRepository } from "./repositories/plants";
import { SchedulesRepository } from "./repositories/schedules";
import { SpeciesRepository } from "./repositories/species";
import { SubscriptionsRepository } from "./repositories/subscriptions";
import { UsersRepository } from "./repositories/users";
import type { SessionManager, TransactionOptions, TransactionScope } from "./session";

export interface UnitOfWork {
  readonly scope: TransactionScope;
  readonly users: UsersRepository;
  readonly species: SpeciesRepository;
  readonly plants: PlantsRepository;
  readonly schedules: SchedulesRepository;
  readonly actionLogs: ActionLogsRepository;
  readonly subscriptions: SubscriptionsRepository;
}

export interface UnitOfWorkOptions extends TransactionOptions {
  /** Timezone given to users created inside this unit of work. */
  defaultTimezone?: string;
}

export function createUnitOfWork(scope: TransactionScope, defaultTimezone?: string): UnitOfWork {
  return {
    scope,
    users: new UsersRepository(scope, defaultTimezone),
    species: new SpeciesRepository(scope),
    plants: new PlantsRepository(scope),
    schedules: new SchedulesRepository(scope),
    actionLogs: new ActionLogsRepository(scope),
    subscriptions: new SubscriptionsRepository(scope),
  };
}

export function withUnitOfWork<T>(
  sessions: SessionManager,
  fn: (uow: UnitOfWork) => Promise<T> | T,
  options: UnitOfWorkOptions = {}
): Promise<T> {
  const { defaultTimezone, ...transaction } = options;
  return sessions.withTransaction((scope) => fn(createUnitOfWork(scope, defaultTimezone)), transaction);
}
