/**
 * Telegram message texts
 */

export const PREVIEW_LENGTH = 50;

export function formatWelcome(): string {
  return [
    "🤖 Hello! I'm your AI assistant powered by The Firm Team.",
    "",
    "I can help you with:",
    "• Answering questions",
    "• Creative writing",
    "• Problem solving",
    "• General conversation",
    "",
    "Just send me any message and I'll respond using AI!",
  ].join("\n");
}

/**
 * Help text, rendered with parse_mode "Markdown"
 */
export function formatHelp(): string {
  return [
    "🆘 *How to use this bot:*",
    "",
    "/start - Start the bot",
    "/help - Show this help message",
    "",
    "Simply send me any text message and I'll respond using AI!",
    "",
    "Examples:",
    "• Ask me questions: 'What is quantum physics?'",
    "• Creative tasks: 'Write a short story about space'",
    "• Problem solving: 'Help me debug this code'",
    "• General chat: 'How are you today?'",
  ].join("\n");
}

export function formatApology(): string {
  return (
    "🚫 Sorry, I encountered an error while processing your message. " +
    "Please try again in a moment."
  );
}

/**
 * Truncated message text for log lines
 */
export function formatPreview(text: string): string {
  return text.slice(0, PREVIEW_LENGTH);
}
