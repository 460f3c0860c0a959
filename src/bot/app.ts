/**
 * Bot wiring
 * Builds the Telegraf instance and binds text messages to the dispatcher
 */

import { Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import type { GeminiClient } from "./ai.js";
import { Dispatcher, createRoutes, toInboundEvent } from "./dispatch.js";
import { createTelegramTransport } from "./transport.js";
import { handleDispatchError } from "./handlers/error.js";

/**
 * Polling options: receive every update type
 */
export const LAUNCH_OPTIONS: Telegraf.LaunchOptions = {
  allowedUpdates: [
    "message",
    "edited_message",
    "channel_post",
    "edited_channel_post",
    "inline_query",
    "chosen_inline_result",
    "callback_query",
    "shipping_query",
    "pre_checkout_query",
    "poll",
    "poll_answer",
    "my_chat_member",
    "chat_member",
    "chat_join_request",
    "message_reaction",
    "message_reaction_count",
    "chat_boost",
    "removed_chat_boost",
  ],
};

export function createBot(token: string, ai: Pick<GeminiClient, "generate">): Telegraf {
  const bot = new Telegraf(token);
  const dispatcher = new Dispatcher(createRoutes(ai));

  bot.on(message("text"), async (ctx) => {
    const event = toInboundEvent({
      chatId: ctx.message.chat.id,
      senderName: ctx.message.from?.first_name,
      text: ctx.message.text,
      entities: ctx.message.entities,
    });
    await dispatcher.dispatch(event, createTelegramTransport(ctx.telegram), ctx.botInfo.username);
  });

  // Error handling
  bot.catch((err, ctx) => {
    handleDispatchError(err, ctx.update);
  });

  return bot;
}
