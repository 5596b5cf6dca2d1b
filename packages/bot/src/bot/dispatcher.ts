/**
 * Event dispatcher
 *
 * Every event runs as one unit of work: the sender is ensured as a user, then
 * each handler runs against the same transaction. Replies are held back until
 * the transaction commits, so a unit of work retried after a conflict never
 * messages the user twice and a rolled-back one never messages at all.
 */

import type { User } from "../db/schema";
import type { SessionManager } from "../db/session";
import { withRetry, type RetryOptions } from "../db/retry";
import { withUnitOfWork, type UnitOfWork } from "../db/unit-of-work";
import { errorMessage } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import type { BotEvent, BotTransport } from "./transport";

export interface HandlerContext {
  event: BotEvent;
  uow: UnitOfWork;
  user: User;
  /** Queue a reply to the event's chat, sent after commit. */
  reply: (text: string) => void;
}

export type EventHandler = (ctx: HandlerContext) => Promise<void> | void;

export type DispatchOutcome =
  | { status: "handled"; attempts: number; replies: number }
  | { status: "failed"; attempts: number; error: unknown };

export interface DispatcherOptions {
  sessions: SessionManager;
  transport: Pick<BotTransport, "send">;
  handlers?: EventHandler[];
  retry?: Omit<RetryOptions, "onRetry">;
  defaultTimezone?: string;
  logger?: Logger;
}

export class Dispatcher {
  private readonly handlers: EventHandler[];
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<DispatchOutcome>>();

  constructor(private readonly options: DispatcherOptions) {
    this.handlers = [...(options.handlers ?? [])];
    this.logger = options.logger ?? createLogger("Dispatcher");
  }

  use(handler: EventHandler): this {
    this.handlers.push(handler);
    return this;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Never rejects; failures are logged and reported in the outcome. */
  dispatch(event: BotEvent): Promise<DispatchOutcome> {
    const task: Promise<DispatchOutcome> = this.process(event).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return task;
  }

  /** Resolves once every event dispatched so far has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private async process(event: BotEvent): Promise<DispatchOutcome> {
    let attempts = 0;
    let replies: string[];

    try {
      replies = await withRetry(
        (attempt) => {
          attempts = attempt;
          return withUnitOfWork(this.options.sessions, (uow) => this.runHandlers(event, uow), {
            mode: "immediate",
            defaultTimezone: this.options.defaultTimezone,
          });
        },
        {
          ...this.options.retry,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn(`Retrying update ${event.updateId}`, { attempt, delayMs, error: errorMessage(error) });
          },
        }
      );
    } catch (error) {
      this.logger.error(`Update ${event.updateId} failed`, { attempts, error: errorMessage(error) });
      return { status: "failed", attempts, error };
    }

    await this.deliver(event, replies);
    return { status: "handled", attempts, replies: replies.length };
  }

  private async runHandlers(event: BotEvent, uow: UnitOfWork): Promise<string[]> {
    const replies: string[] = [];
    const user = await uow.users.ensure(event.userId, event.username);

    for (const handler of this.handlers) {
      await handler({ event, uow, user, reply: (text) => replies.push(text) });
    }
    return replies;
  }

  private async deliver(event: BotEvent, replies: string[]): Promise<void> {
    if (replies.length === 0) return;
    if (event.chatId === undefined) {
      this.logger.warn(`Update ${event.updateId} has no chat; dropping ${replies.length} replies`);
      return;
    }

    for (const text of replies) {
      try {
        await this.options.transport.send(event.chatId, text);
      } catch (error) {
        // The unit of work has committed; a failed send is not a reason to redo it
        this.logger.error(`Reply to update ${event.updateId} failed`, { chatId: event.chatId, error: errorMessage(error) });
      }
    }
  }
}
