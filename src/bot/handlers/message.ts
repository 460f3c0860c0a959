/**
 * Message handler - free text relayed to Gemini
 * Catches all non-command text and replies with the generated answer
 */

import type { ConversationHandler, OutboundReply } from "../types.js";
import type { GeminiClient } from "../ai.js";
import { formatApology, formatPreview } from "../formatters/telegram.js";
import { createLogger, errorMessage } from "../logger.js";

const log = createLogger("message");

type TextGenerator = Pick<GeminiClient, "generate">;

/**
 * Create the free-text handler around an AI client
 */
export function createTextHandler(ai: TextGenerator): ConversationHandler {
  return {
    async handle(event, transport) {
      const { chatId, senderName, text } = event;
      if (text === undefined) {
        log.warn(`Ignoring message without text from ${senderName}`);
        return null;
      }

      log.info(`Received message from ${senderName}: ${formatPreview(text)}...`);

      try {
        await transport.sendTyping(chatId);
      } catch (error) {
        log.warn(`Typing indicator failed for chat ${chatId}: ${errorMessage(error)}`);
      }

      const result = await ai.generate(text);

      // A rejected delivery (e.g. an over-long answer) gets the apology too
      let failure: string;
      if (result.ok) {
        const reply: OutboundReply = { chatId, text: result.text };
        try {
          await transport.sendReply(reply);
          log.info(`Sent AI response to ${senderName}`);
          return reply;
        } catch (error) {
          failure = errorMessage(error);
        }
      } else {
        failure = result.message;
      }

      log.error(`Error generating AI response: ${failure}`);
      const apology: OutboundReply = { chatId, text: formatApology() };
      await transport.sendReply(apology);
      return apology;
    },
  };
}
