/**
 * Dispatch tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Dispatcher, createRoutes, toInboundEvent } from "../../src/bot/dispatch.js";
import { formatWelcome, formatHelp } from "../../src/bot/formatters/telegram.js";
import type { ConversationHandler } from "../../src/bot/types.js";
import { createFakeTransport, fakeAi } from "./fakes.js";

const command = (text: string, length: number) => ({
  chatId: 1,
  senderName: "Bob",
  text,
  entities: [{ type: "bot_command", offset: 0, length }],
});

describe("toInboundEvent", () => {
  it("should classify a leading bot command", () => {
    expect(toInboundEvent(command("/start", 6))).toEqual({
      kind: "command",
      command: "start",
      chatId: 1,
      senderName: "Bob",
      text: "/start",
    });
  });

  it("should split off the bot mention and lower-case the command", () => {
    const event = toInboundEvent(command("/Help@RelayBot please", 14));
    expect(event).toEqual({
      kind: "command",
      command: "help",
      mention: "RelayBot",
      chatId: 1,
      senderName: "Bob",
      text: "/Help@RelayBot please",
    });
  });

  it("should treat plain text as a text event", () => {
    expect(toInboundEvent({ chatId: 5, senderName: "Bob", text: "hello" })).toEqual({
      kind: "text",
      chatId: 5,
      senderName: "Bob",
      text: "hello",
    });
  });

  it("should ignore commands that do not start the message", () => {
    const event = toInboundEvent({
      chatId: 5,
      senderName: "Bob",
      text: "try /start",
      entities: [{ type: "bot_command", offset: 4, length: 6 }],
    });
    expect(event.kind).toBe("text");
  });

  it("should default the sender name", () => {
    expect(toInboundEvent({ chatId: 5, text: "hi" }).senderName).toBe("unknown");
  });
});

describe("Dispatcher", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("routeFor", () => {
    const dispatcher = new Dispatcher(createRoutes(fakeAi({ ok: true, text: "" })));

    it("should route known commands and free text", () => {
      expect(dispatcher.routeFor(toInboundEvent(command("/start", 6)))).toBe("start");
      expect(dispatcher.routeFor(toInboundEvent(command("/help", 5)))).toBe("help");
      expect(dispatcher.routeFor(toInboundEvent({ chatId: 1, text: "hey" }))).toBe("text");
    });

    it("should route commands addressed to this bot", () => {
      expect(dispatcher.routeFor(toInboundEvent(command("/start@RelayBot", 15)), "relaybot")).toBe(
        "start"
      );
      expect(dispatcher.routeFor(toInboundEvent(command("/help@relaybot", 14)), "RelayBot")).toBe(
        "help"
      );
    });

    it("should not route commands addressed to another bot", () => {
      expect(
        dispatcher.routeFor(toInboundEvent(command("/start@otherbot", 15)), "relaybot")
      ).toBeNull();
      expect(dispatcher.routeFor(toInboundEvent(command("/help@otherbot", 14)))).toBeNull();
    });

    it("should not route unknown commands", () => {
      expect(dispatcher.routeFor(toInboundEvent(command("/settings", 9)))).toBeNull();
      expect(dispatcher.routeFor(toInboundEvent(command("/text", 5)))).toBeNull();
      expect(dispatcher.routeFor(toInboundEvent(command("/constructor", 12)))).toBeNull();
    });
  });

  describe("dispatch", () => {
    it("should deliver the /start welcome", async () => {
      const transport = createFakeTransport();
      const dispatcher = new Dispatcher(createRoutes(fakeAi({ ok: true, text: "" })));

      const reply = await dispatcher.dispatch(toInboundEvent(command("/start", 6)), transport);

      expect(reply).toEqual({ chatId: 1, text: formatWelcome() });
      expect(transport.sent).toEqual([{ chatId: 1, text: formatWelcome() }]);
    });

    it("should deliver /help with Markdown", async () => {
      const transport = createFakeTransport();
      const ai = fakeAi({ ok: true, text: "" });
      const dispatcher = new Dispatcher(createRoutes(ai));

      await dispatcher.dispatch(toInboundEvent(command("/help", 5)), transport);

      expect(transport.sent).toEqual([{ chatId: 1, text: formatHelp(), parseMode: "Markdown" }]);
      expect(ai.generate).not.toHaveBeenCalled();
    });

    it("should stay silent for commands meant for another bot", async () => {
      const transport = createFakeTransport();
      const ai = fakeAi({ ok: true, text: "unused" });
      const dispatcher = new Dispatcher(createRoutes(ai));

      const reply = await dispatcher.dispatch(
        toInboundEvent(command("/start@otherbot", 15)),
        transport,
        "relaybot"
      );

      expect(reply).toBeNull();
      expect(transport.sent).toEqual([]);
      expect(ai.generate).not.toHaveBeenCalled();
    });

    it("should send nothing for unknown commands", async () => {
      const transport = createFakeTransport();
      const ai = fakeAi({ ok: true, text: "unused" });
      const dispatcher = new Dispatcher(createRoutes(ai));

      const reply = await dispatcher.dispatch(toInboundEvent(command("/settings", 9)), transport);

      expect(reply).toBeNull();
      expect(transport.sent).toEqual([]);
      expect(ai.generate).not.toHaveBeenCalled();
    });

    it("should log and swallow handler failures", async () => {
      const failing: ConversationHandler = {
        handle: vi.fn().mockRejectedValue(new Error("handler exploded")),
      };
      const transport = createFakeTransport();
      const dispatcher = new Dispatcher({ text: failing });

      const reply = await dispatcher.dispatch({ kind: "text", chatId: 3, senderName: "Bob", text: "hi" }, transport);

      expect(reply).toBeNull();
      expect(transport.sent).toEqual([]);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining("caused error handler exploded")
      );
    });

    it("should log and swallow delivery failures", async () => {
      const transport = createFakeTransport();
      vi.mocked(transport.sendReply).mockRejectedValue(new Error("Forbidden: bot was blocked"));
      const dispatcher = new Dispatcher(createRoutes(fakeAi({ ok: true, text: "answer" })));

      const reply = await dispatcher.dispatch({ kind: "text", chatId: 3, senderName: "Bob", text: "hi" }, transport);

      expect(reply).toBeNull();
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining("caused error Forbidden: bot was blocked")
      );
    });

    it("should address concurrent replies to their own chats", async () => {
      const ai = {
        generate: vi.fn(async (prompt: string) => {
          // The first chat's answer arrives last
          await new Promise((resolve) => setTimeout(resolve, prompt === "from chat 100" ? 20 : 0));
          return { ok: true as const, text: `echo: ${prompt}` };
        }),
      };
      const transport = createFakeTransport();
      const dispatcher = new Dispatcher(createRoutes(ai));

      await Promise.all([
        dispatcher.dispatch({ kind: "text", chatId: 100, senderName: "A", text: "from chat 100" }, transport),
        dispatcher.dispatch({ kind: "text", chatId: 200, senderName: "B", text: "from chat 200" }, transport),
      ]);

      expect(transport.sent).toEqual([
        { chatId: 200, text: "echo: from chat 200" },
        { chatId: 100, text: "echo: from chat 100" },
      ]);
      expect(transport.typing.sort()).toEqual([100, 200]);
    });
  });
});
