import { CoreConfig } from "@/config/config-schema";
import { COMMAND_PREFIX } from "@/services/command-registry";
import { EventDeduplicator, aiClaimKey } from "@/services/event-deduplicator";
import { EventQueue } from "@/services/event-queue";
import { ChatState, SYSTEM_SENDER } from "@/state/chat-state";
import { Message, Scope, SwarmRole } from "@/types/global";
import { InferenceService, MeshTransport, ModelRef } from "@/types/interface";
import { generateId } from "@/utils/random";

export type AITriggerConfig = Pick<
  CoreConfig,
  | "aiMarker"
  | "aiDebounceMs"
  | "loopKeywords"
  | "statusPreviewLength"
  | "responseWordLimit"
>;

export interface AIResponseTriggerDeps {
  state: ChatState;
  transport: MeshTransport;
  inference: InferenceService;
  deduplicator: EventDeduplicator;
  queue: EventQueue;
  config: AITriggerConfig;
}

const ROLE_CONTEXT: Record<SwarmRole, string> = {
  [SwarmRole.MEDIC]: "You are assisting a field medic in an emergency team.",
  [SwarmRole.SCOUT]: "You are assisting a reconnaissance scout in an emergency team.",
  [SwarmRole.LEADER]: "You are assisting the incident commander of an emergency team.",
  [SwarmRole.HELPER]: "You are assisting a support and supplies helper in an emergency team.",
  [SwarmRole.ANALYST]: "You are assisting a data analyst in an emergency team.",
  [SwarmRole.UNASSIGNED]: "You are assisting a member of an emergency team.",
};

const ANALYSIS_PROMPT: Record<SwarmRole, string> = {
  [SwarmRole.MEDIC]: "As a field medic, analyze this medical situation:",
  [SwarmRole.SCOUT]: "As a reconnaissance scout, analyze this terrain/hazard:",
  [SwarmRole.LEADER]: "As incident commander, provide tactical analysis:",
  [SwarmRole.HELPER]: "As a support helper, analyze what is needed:",
  [SwarmRole.ANALYST]: "As data analyst, provide detailed technical analysis:",
  [SwarmRole.UNASSIGNED]: "Analyze this emergency situation:",
};

const TEXT_MODELS = { text: true, vision: false };

export function analysisPrompt(role: SwarmRole, situation: string): string {
  return `${ANALYSIS_PROMPT[role]} ${situation}`;
}

const scopeOf = (channel: string | null): Scope =>
  channel ? { kind: "channel", channel } : { kind: "main" };

const errorText = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Decides when an inbound message gets an automatic AI reply and runs the
 * streaming request/response cycle.
 *
 * Collaborator callbacks are re-entered through the event queue, so partial
 * results update the chat state in order with every other event. A stalled
 * inference leaves its placeholder in the "thinking" state; nothing here
 * times it out or retries it.
 */
export class AIResponseTrigger {
  private readonly state: ChatState;
  private readonly transport: MeshTransport;
  private readonly inference: InferenceService;
  private readonly deduplicator: EventDeduplicator;
  private readonly queue: EventQueue;
  private readonly config: AITriggerConfig;

  constructor(deps: AIResponseTriggerDeps) {
    this.state = deps.state;
    this.transport = deps.transport;
    this.inference = deps.inference;
    this.deduplicator = deps.deduplicator;
    this.queue = deps.queue;
    this.config = deps.config;
  }

  /**
   * Every condition must hold for a message to get an automatic reply.
   */
  isEligible(message: Message): boolean {
    const content = message.content;
    const lowered = content.toLowerCase();

    return (
      this.state.autoRespond &&
      !message.isPrivate &&
      message.senderPeerId !== this.transport.myPeerId &&
      !content.startsWith(this.config.aiMarker) &&
      !content.startsWith(COMMAND_PREFIX) &&
      message.sender !== SYSTEM_SENDER &&
      !this.config.loopKeywords.some((k) => lowered.includes(k.toLowerCase()))
    );
  }

  /**
   * Offer an inbound public message. Starts at most one reply per message
   * within the debounce window.
   *
   * @returns true when a reply was started
   */
  maybeRespond(message: Message): boolean {
    if (!this.isEligible(message)) return false;

    if (
      !this.deduplicator.shouldProcess(
        aiClaimKey(message.id),
        this.config.aiDebounceMs,
      )
    ) {
      console.log(`[AIResponseTrigger] Reply already claimed for ${message.id}`);
      return false;
    }

    const model = this.resolveModel();
    if (!model) return false;

    const { aiMarker, statusPreviewLength } = this.config;
    const preview =
      message.content.length > statusPreviewLength
        ? `${message.content.slice(0, statusPreviewLength)}...`
        : message.content;

    // Tell the mesh right away; inference may take a while
    this.transport.send(
      `${aiMarker} AI processing "${preview}"`,
      [],
      message.channel,
    );

    console.log(`[AIResponseTrigger] Replying to ${message.id}`);
    this.run(
      model,
      `Message from ${message.sender}: ${message.content}`,
      message.channel,
    );
    return true;
  }

  /**
   * Run a prompt and broadcast the answer to `channel` (null for main).
   * Used for automatic replies and for /ai and /analyze.
   */
  ask(prompt: string, channel: string | null): void {
    const model = this.resolveModel();
    if (model) this.run(model, prompt, channel);
  }

  private run(model: ModelRef, prompt: string, channel: string | null): void {
    const fullPrompt = this.buildPrompt(prompt);

    if (this.inference.isInitialized(model)) {
      this.infer(model, fullPrompt, channel);
      return;
    }

    this.state.addSystemMessage(
      "🔄 AI model not initialized. Initializing now...",
    );

    try {
      this.inference.initialize(model, (error) => {
        void this.queue.enqueue("ai:initialized", () =>
          this.onInitialized(model, error, fullPrompt, channel),
        );
      });
    } catch (error) {
      this.state.addSystemMessage(
        `❌ Model initialization error: ${errorText(error)}`,
      );
    }
  }

  /** Whether a downloaded text model exists on this device. */
  hasUsableModel(): boolean {
    return this.inference
      .listModels(TEXT_MODELS)
      .some((m) => this.inference.isDownloaded(m));
  }

  /** One-line readiness summary for /ai-status. */
  readiness(): string {
    const models = this.inference.listModels(TEXT_MODELS);
    const downloaded = models.filter((m) => this.inference.isDownloaded(m));

    if (models.length === 0) {
      return "🚨 CRITICAL: No AI models configured! Emergency AI disabled.";
    }
    if (downloaded.length === 0) {
      const names = models.map((m) => m.name).join(", ");
      return `⚠️ WARNING: AI models not downloaded (${names}). Emergency AI unavailable.`;
    }
    if (downloaded.some((m) => this.inference.isInitialized(m))) {
      return "✅ Emergency AI ready and initialized.";
    }
    return "⚡ Emergency AI available but not initialized (will auto-init on first use).";
  }

  private resolveModel(): ModelRef | null {
    const models = this.inference.listModels(TEXT_MODELS);

    if (models.length === 0) {
      this.state.addSystemMessage(
        "❌ Emergency AI unavailable: no AI models configured.\n\n" +
          "💡 To enable it:\n" +
          "1. Download a chat model on this device\n" +
          "2. AI replies activate automatically once it is available",
      );
      return null;
    }

    const downloaded = models.find((m) => this.inference.isDownloaded(m));
    if (!downloaded) {
      const names = models.map((m) => m.name).join(", ");
      this.state.addSystemMessage(
        "📥 Emergency AI unavailable: no chat model downloaded.\n\n" +
          `💡 Download one of: ${names}, then try again.`,
      );
      return null;
    }

    return downloaded;
  }

  private onInitialized(
    model: ModelRef,
    error: string,
    prompt: string,
    channel: string | null,
  ): void {
    if (error.length > 0) {
      this.state.addSystemMessage(
        `❌ AI model initialization failed: ${error}\n\n` +
          "💡 Try:\n" +
          "1. Restart the app\n" +
          "2. Re-download the model if it is corrupted\n" +
          "3. Check device storage space",
      );
      return;
    }

    this.state.addSystemMessage("✅ Model ready! Processing your request...");
    this.infer(model, prompt, channel);
  }

  private buildPrompt(prompt: string): string {
    return (
      `Please provide a helpful response in ${this.config.responseWordLimit} words or less. ` +
      "Be concise and direct.\n\n" +
      `${ROLE_CONTEXT[this.state.myRole]}\n\n${prompt}`
    );
  }

  private infer(model: ModelRef, prompt: string, channel: string | null): void {
    const { aiMarker } = this.config;
    const placeholder: Message = {
      id: generateId("ai_response"),
      sender: `${aiMarker} AI Assistant`,
      senderPeerId: this.transport.myPeerId,
      content: `${aiMarker} AI is thinking...`,
      timestamp: Date.now(),
      channel,
      isPrivate: false,
      recipientNickname: null,
      deliveryStatus: null,
    };
    this.state.addMessage(scopeOf(channel), placeholder);

    let accumulated = "";
    let finished = false;

    const onPartial = (text: string, done: boolean) => {
      if (finished) return;
      accumulated += text;

      if (!done) {
        if (accumulated.length > 0) {
          this.state.updateMessageContent(
            placeholder.id,
            `${aiMarker} AI Assistant: ${accumulated} ▊`,
          );
        }
        return;
      }

      finished = true;
      const final = accumulated.trim();
      if (final.length === 0) return;

      this.state.updateMessageContent(
        placeholder.id,
        `${aiMarker} AI Assistant: ${final}`,
      );
      this.transport.send(`${aiMarker} ${final}`, [], channel);
      console.log(`[AIResponseTrigger] Broadcast reply ${placeholder.id}`);
    };

    try {
      this.inference.runInference(
        model,
        prompt,
        null,
        (text, done) => {
          void this.queue.enqueue("ai:partial", () => onPartial(text, done));
        },
        () => console.log(`[AIResponseTrigger] Inference cleaned up ${placeholder.id}`),
      );
    } catch (error) {
      console.error("[AIResponseTrigger] Inference failed:", error);
      this.state.addSystemMessage(`❌ AI inference failed: ${errorText(error)}`);
    }
  }
}
