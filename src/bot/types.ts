/**
 * Shared bot types
 */

export type ChatId = number;

export type ParseMode = "Markdown" | "MarkdownV2" | "HTML";

/**
 * One unit of incoming chat activity
 */
export type InboundEvent =
  | {
      kind: "command";
      /** Lower-cased command name without "/" or "@botname" */
      command: string;
      /** Bot username from a "/command@botname" suffix */
      mention?: string;
      chatId: ChatId;
      senderName: string;
      text: string;
    }
  | {
      kind: "text";
      chatId: ChatId;
      senderName: string;
      text?: string;
    };

export interface OutboundReply {
  chatId: ChatId;
  text: string;
  parseMode?: ParseMode;
}

/**
 * Outgoing side of the chat platform
 */
export interface ChatTransport {
  sendTyping(chatId: ChatId): Promise<void>;
  sendReply(reply: OutboundReply): Promise<void>;
}

/**
 * Handles one event, delivering at most one reply through the transport.
 * Resolves to the reply it delivered.
 */
export interface ConversationHandler {
  handle(event: InboundEvent, transport: ChatTransport): Promise<OutboundReply | null>;
}
