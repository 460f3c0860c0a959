/**
 * Telegram-backed chat transport
 */

import type { ChatId, ChatTransport, ParseMode } from "./types.js";

/**
 * The Telegram API calls the transport uses (satisfied by Telegraf's Telegram)
 */
export interface TelegramApi {
  sendChatAction(chatId: ChatId, action: "typing"): Promise<unknown>;
  sendMessage(chatId: ChatId, text: string, extra?: { parse_mode: ParseMode }): Promise<unknown>;
}

export function createTelegramTransport(telegram: TelegramApi): ChatTransport {
  return {
    async sendTyping(chatId) {
      await telegram.sendChatAction(chatId, "typing");
    },

    async sendReply({ chatId, text, parseMode }) {
      if (parseMode) {
        await telegram.sendMessage(chatId, text, { parse_mode: parseMode });
      } else {
        await telegram.sendMessage(chatId, text);
      }
    },
  };
}
