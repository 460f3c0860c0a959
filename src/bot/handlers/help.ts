/**
 * Help handler - /help command
 */

import type { ConversationHandler, OutboundReply } from "../types.js";
import { formatHelp } from "../formatters/telegram.js";

export const helpHandler: ConversationHandler = {
  async handle(event, transport) {
    const reply: OutboundReply = {
      chatId: event.chatId,
      text: formatHelp(),
      parseMode: "Markdown",
    };
    await transport.sendReply(reply);
    return reply;
  },
};
