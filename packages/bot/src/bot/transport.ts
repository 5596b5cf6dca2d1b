/**
 * A single inbound update, reduced to what the dispatcher needs.
 */
export interface BotEvent {
  updateId: number;
  /** Telegram user id of the sender. */
  userId: number;
  username?: string;
  chatId?: number;
  text?: string;
}

export type BotEventListener = (event: BotEvent) => Promise<unknown>;

export interface BotTransport {
  /** Begin delivering events. Resolves once the transport is receiving. */
  start(onEvent: BotEventListener): Promise<void>;
  /** Stop receiving. Events already delivered keep running. */
  stop(): Promise<void>;
  send(chatId: number, text: string): Promise<void>;
}
