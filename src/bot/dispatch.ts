/**
 * Event dispatch
 * Classifies incoming messages and routes them through an explicit handler table
 */

import type {
  ChatId,
  ChatTransport,
  ConversationHandler,
  InboundEvent,
  OutboundReply,
} from "./types.js";
import type { GeminiClient } from "./ai.js";
import { startHandler } from "./handlers/start.js";
import { helpHandler } from "./handlers/help.js";
import { createTextHandler } from "./handlers/message.js";
import { handleDispatchError } from "./handlers/error.js";
import { createLogger } from "./logger.js";

const log = createLogger("dispatch");

export type RouteTable = Readonly<Record<string, ConversationHandler>>;

/**
 * Fields of a Telegram message needed to build an InboundEvent
 */
export interface IncomingMessage {
  chatId: ChatId;
  senderName?: string;
  text?: string;
  entities?: ReadonlyArray<{ type: string; offset: number; length: number }>;
}

/**
 * Classify a message as a command (leading bot_command entity) or free text
 */
export function toInboundEvent(message: IncomingMessage): InboundEvent {
  const { chatId, text } = message;
  const senderName = message.senderName || "unknown";

  const commandEntity = message.entities?.find(
    (entity) => entity.type === "bot_command" && entity.offset === 0
  );

  if (text !== undefined && commandEntity) {
    const [name, mention] = text.slice(1, commandEntity.length).split("@");
    const command = name.toLowerCase();
    return mention
      ? { kind: "command", command, mention, chatId, senderName, text }
      : { kind: "command", command, chatId, senderName, text };
  }

  return { kind: "text", chatId, senderName, text };
}

/**
 * Default routes: /start, /help and free text
 */
export function createRoutes(ai: Pick<GeminiClient, "generate">): RouteTable {
  return {
    start: startHandler,
    help: helpHandler,
    text: createTextHandler(ai),
  };
}

export class Dispatcher {
  constructor(private readonly routes: RouteTable) {}

  /**
   * Handler key for an event, or null when nothing handles it.
   * Commands mentioning another bot are not ours to answer.
   */
  routeFor(event: InboundEvent, botUsername?: string): string | null {
    if (event.kind === "text") {
      return Object.hasOwn(this.routes, "text") ? "text" : null;
    }

    const { command, mention } = event;
    if (mention !== undefined && mention.toLowerCase() !== botUsername?.toLowerCase()) {
      return null;
    }
    return command !== "text" && Object.hasOwn(this.routes, command) ? command : null;
  }

  /**
   * Run the handler for one event.
   * Failures are logged and resolve to null.
   */
  async dispatch(
    event: InboundEvent,
    transport: ChatTransport,
    botUsername?: string
  ): Promise<OutboundReply | null> {
    const route = this.routeFor(event, botUsername);
    if (route === null) return null;

    try {
      const reply = await this.routes[route].handle(event, transport);
      if (reply) {
        log.info(`Replied to chat ${reply.chatId}`);
      }
      return reply;
    } catch (error) {
      handleDispatchError(error, event);
      return null;
    }
  }
}
