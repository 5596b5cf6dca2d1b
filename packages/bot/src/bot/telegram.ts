/**
 * Telegram transport
 *
 * Long polling through grammy, with @grammyjs/runner fetching and handling
 * updates concurrently so one slow unit of work does not hold up the rest.
 */

import { Bot, GrammyError, HttpError } from "grammy";
import type { Update } from "grammy/types";
import { run, type RunnerHandle } from "@grammyjs/runner";
import { createLogger, type Logger } from "../lib/logger";
import type { BotEvent, BotEventListener, BotTransport } from "./transport";

/**
 * Reduce an update to a `BotEvent`. Updates without a human sender (channel
 * posts, service updates) yield `undefined`.
 */
export function toBotEvent(update: Update): BotEvent | undefined {
  const message = update.message ?? update.edited_message;
  if (message?.from && !message.from.is_bot) {
    return {
      updateId: update.update_id,
      userId: message.from.id,
      username: message.from.username,
      chatId: message.chat.id,
      text: message.text ?? message.caption,
    };
  }

  const query = update.callback_query;
  if (query && !query.from.is_bot) {
    return {
      updateId: update.update_id,
      userId: query.from.id,
      username: query.from.username,
      chatId: query.message?.chat.id,
      text: query.data,
    };
  }

  return undefined;
}

export interface TelegramTransportOptions {
  token: string;
  logger?: Logger;
}

export class TelegramTransport implements BotTransport {
  private readonly bot: Bot;
  private readonly logger: Logger;
  private runner: RunnerHandle | null = null;

  constructor(options: TelegramTransportOptions) {
    this.bot = new Bot(options.token);
    this.logger = options.logger ?? createLogger("Telegram");
  }

  async start(onEvent: BotEventListener): Promise<void> {
    if (this.runner) {
      throw new Error("Telegram transport is already running");
    }

    this.bot.use(async (ctx) => {
      const event = toBotEvent(ctx.update);
      if (event) {
        await onEvent(event);
      }
      if (ctx.callbackQuery) {
        await ctx.answerCallbackQuery();
      }
    });

    this.bot.catch((error) => {
      const cause = error.error;
      if (cause instanceof GrammyError) {
        this.logger.error(`Telegram rejected a request: ${cause.description}`, { updateId: error.ctx.update.update_id });
      } else if (cause instanceof HttpError) {
        this.logger.error("Could not reach Telegram", { error: cause });
      } else {
        this.logger.error("Unhandled error while processing update", {
          updateId: error.ctx.update.update_id,
          error: cause,
        });
      }
    });

    await this.bot.init();
    this.logger.info(`Connected as @${this.bot.botInfo.username}`);
    this.runner = run(this.bot);
  }

  async stop(): Promise<void> {
    const runner = this.runner;
    this.runner = null;
    if (runner?.isRunning()) {
      await runner.stop();
    }
  }

  async send(chatId: number, text: string): Promise<void> {
    await this.bot.api.sendMessage(chatId, text);
  }
}
