import { DEFAULT_CORE_CONFIG } from "@/config/config-schema";
import { ChatState, SYSTEM_SENDER } from "@/state/chat-state";
import { FakeInference, FakeTransport, makeMessage } from "@/testing/fakes";
import { Message } from "@/types/global";
import { AIResponseTrigger } from "../ai-response-trigger";
import { EventDeduplicator } from "../event-deduplicator";
import { EventQueue } from "../event-queue";

function setup() {
  let now = 0;
  const state = new ChatState("me", true);
  const transport = new FakeTransport("ME");
  const inference = new FakeInference();
  const queue = new EventQueue();
  const trigger = new AIResponseTrigger({
    state,
    transport,
    inference,
    deduplicator: new EventDeduplicator({}, () => now),
    queue,
    config: DEFAULT_CORE_CONFIG,
  });

  const mainMessages = () => state.getMessages({ kind: "main" });
  const lastSystem = () =>
    mainMessages()
      .filter((m) => m.sender === SYSTEM_SENDER)
      .map((m) => m.content)
      .pop();
  const advance = (ms: number) => {
    now += ms;
  };

  return { state, transport, inference, queue, trigger, mainMessages, lastSystem, advance };
}

describe("AIResponseTrigger", () => {
  describe("eligibility", () => {
    it("accepts an ordinary public message from a peer", () => {
      const { trigger } = setup();
      expect(trigger.isEligible(makeMessage({ content: "need water" }))).toBe(true);
    });

    const rejected: [string, Partial<Message>][] = [
      ["an earlier AI reply", { content: "🤖 hello" }],
      ["a command", { content: "/ai hi" }],
      ["a loop keyword", { content: "this is a TIMEOUT again" }],
      ["a private message", { isPrivate: true }],
      ["our own message", { senderPeerId: "ME" }],
      ["a system message", { sender: SYSTEM_SENDER }],
    ];

    it.each(rejected)("rejects %s", (_label, overrides) => {
      const { trigger } = setup();
      expect(trigger.isEligible(makeMessage(overrides))).toBe(false);
    });

    it("rejects everything while auto-respond is off", () => {
      const { state, trigger } = setup();
      state.autoRespond = false;
      expect(trigger.isEligible(makeMessage())).toBe(false);
    });
  });

  describe("automatic replies", () => {
    it("streams a reply into a placeholder and broadcasts the result", async () => {
      const { transport, inference, queue, trigger, mainMessages } = setup();
      inference.withModel("gemma");

      expect(
        trigger.maybeRespond(makeMessage({ content: "how to purify water" })),
      ).toBe(true);

      const [placeholder] = mainMessages();
      expect(placeholder.sender).toBe("🤖 AI Assistant");
      expect(placeholder.content).toBe("🤖 AI is thinking...");
      expect(placeholder.id.startsWith("ai_response_")).toBe(true);

      inference.emit("Boil ");
      inference.emit("it.");
      await queue.onIdle();
      expect(placeholder.content).toBe("🤖 AI Assistant: Boil it. ▊");

      inference.emit("", true);
      await queue.onIdle();
      expect(placeholder.content).toBe("🤖 AI Assistant: Boil it.");
      expect(transport.broadcasts()).toEqual([
        ['🤖 AI processing "how to purify water"', null],
        ["🤖 Boil it.", null],
      ]);
    });

    it("replies in the channel the message came from", async () => {
      const { state, transport, inference, queue, trigger } = setup();
      inference.withModel("gemma");
      state.joinChannel("#ops", "ME");

      trigger.maybeRespond(makeMessage({ channel: "#ops", content: "status?" }));
      inference.emit("All clear.", true);
      await queue.onIdle();

      expect(transport.broadcasts()).toEqual([
        ['🤖 AI processing "status?"', "#ops"],
        ["🤖 All clear.", "#ops"],
      ]);
      expect(
        state.getMessages({ kind: "channel", channel: "#ops" })[0].content,
      ).toBe("🤖 AI Assistant: All clear.");
    });

    it("quotes a long message in the processing notice", () => {
      const { transport, inference, trigger } = setup();
      inference.withModel("gemma");

      trigger.maybeRespond(makeMessage({ content: "x".repeat(60) }));

      expect(transport.send).toHaveBeenCalledWith(
        `🤖 AI processing "${"x".repeat(50)}..."`,
        [],
        null,
      );
    });

    it("stays quiet on the mesh when no model is available", () => {
      const { transport, inference, trigger, lastSystem } = setup();

      expect(trigger.maybeRespond(makeMessage({ content: "need water" }))).toBe(false);

      expect(transport.send).not.toHaveBeenCalled();
      expect(inference.runs).toHaveLength(0);
      expect(
        lastSystem()?.startsWith("❌ Emergency AI unavailable: no AI models configured."),
      ).toBe(true);
    });

    it("starts one reply per message within the debounce window", () => {
      const { inference, trigger, advance } = setup();
      inference.withModel("gemma");
      const message = makeMessage();

      expect(trigger.maybeRespond(message)).toBe(true);
      advance(4000);
      expect(trigger.maybeRespond(message)).toBe(false);
      expect(inference.runs).toHaveLength(1);

      advance(1001);
      expect(trigger.maybeRespond(message)).toBe(true);
    });

    it("never replies to its own broadcast", async () => {
      const { transport, inference, queue, trigger } = setup();
      inference.withModel("gemma");

      trigger.maybeRespond(makeMessage({ content: "hi" }));
      inference.emit("Hello there.", true);
      await queue.onIdle();

      const [finalText] = transport.send.mock.calls[1];
      expect(trigger.isEligible(makeMessage({ content: finalText }))).toBe(false);
    });
  });

  describe("model resolution", () => {
    it("initializes the model before running", async () => {
      const { inference, queue, trigger, lastSystem } = setup();
      inference.withModel("gemma", { initialized: false });

      trigger.ask("hi", null);
      expect(lastSystem()).toBe("🔄 AI model not initialized. Initializing now...");
      expect(inference.runs).toHaveLength(0);

      inference.finishInitialization();
      await queue.onIdle();

      expect(lastSystem()).toBe("✅ Model ready! Processing your request...");
      expect(inference.runs).toHaveLength(1);
    });

    it("explains an initialization failure", async () => {
      const { inference, queue, trigger, lastSystem } = setup();
      inference.withModel("gemma", { initialized: false });

      trigger.ask("hi", null);
      inference.finishInitialization("out of memory");
      await queue.onIdle();

      expect(
        lastSystem()?.startsWith("❌ AI model initialization failed: out of memory"),
      ).toBe(true);
      expect(inference.runs).toHaveLength(0);
    });

    it("names the models that still need downloading", () => {
      const { inference, trigger, lastSystem } = setup();
      inference.withModel("gemma", { downloaded: false });

      trigger.ask("hi", null);

      expect(lastSystem()).toBe(
        "📥 Emergency AI unavailable: no chat model downloaded.\n\n" +
          "💡 Download one of: gemma, then try again.",
      );
    });

    it("reports an inference failure and keeps the placeholder", () => {
      const { inference, trigger, mainMessages, lastSystem } = setup();
      inference.withModel("gemma");
      inference.runInference.mockImplementation(() => {
        throw new Error("engine crashed");
      });
      const error = jest.spyOn(console, "error").mockImplementation(() => {});

      trigger.ask("hi", null);

      expect(lastSystem()).toBe("❌ AI inference failed: engine crashed");
      expect(mainMessages()[0].content).toBe("🤖 AI is thinking...");

      error.mockRestore();
    });
  });

  it("broadcasts nothing for an empty answer", async () => {
    const { transport, inference, queue, trigger, mainMessages } = setup();
    inference.withModel("gemma");

    trigger.ask("hi", null);
    inference.emit("   ", true);
    inference.emit("late");
    await queue.onIdle();

    expect(transport.send).not.toHaveBeenCalled();
    expect(mainMessages()[0].content).toBe("🤖 AI is thinking...");
  });

  it("puts the word limit and role context in the prompt", () => {
    const { inference, trigger } = setup();
    inference.withModel("gemma");

    trigger.ask("Message from alice: hi", null);

    expect(inference.runs[0].prompt).toBe(
      "Please provide a helpful response in 300 words or less. Be concise and direct.\n\n" +
        "You are assisting a member of an emergency team.\n\n" +
        "Message from alice: hi",
    );
  });
});
