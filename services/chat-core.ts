import { Clock, monotonicClock } from "@/cache/ttl-cache";
import { CoreConfig } from "@/config/config-schema";
import { AIResponseTrigger } from "@/services/ai-response-trigger";
import {
  CommandDispatcher,
  DispatchResult,
} from "@/services/command-dispatcher";
import { suggest } from "@/services/command-registry";
import { EventDeduplicator } from "@/services/event-deduplicator";
import { EventQueue } from "@/services/event-queue";
import { EventRouter } from "@/services/event-router";
import { MessageSender } from "@/services/message-sender";
import { ChatState } from "@/state/chat-state";
import { CommandSuggestion, InboundEvent } from "@/types/global";
import { InferenceService, MeshTransport } from "@/types/interface";

export interface ChatCoreOptions {
  config: CoreConfig;
  transport: MeshTransport;
  inference: InferenceService;
  nickname: string;
  /** Monotonic clock for dedup retention; defaults to performance.now() */
  clock?: Clock;
  /** Epoch millis for outbound records; defaults to Date.now() */
  wallClock?: () => number;
}

/**
 * Owns the chat state and funnels every producer (transport callbacks, user
 * input, AI callbacks) through one serialized queue.
 */
export class ChatCore {
  readonly state: ChatState;
  readonly queue = new EventQueue();

  private readonly transport: MeshTransport;
  private readonly deduplicator: EventDeduplicator;
  private readonly sender: MessageSender;
  private readonly ai: AIResponseTrigger;
  private readonly router: EventRouter;
  private readonly dispatcher: CommandDispatcher;
  private readonly wallClock: () => number;

  constructor(options: ChatCoreOptions) {
    const { config, transport, inference } = options;

    this.transport = transport;
    this.wallClock = options.wallClock ?? Date.now;
    this.state = new ChatState(options.nickname, config.autoRespond);
    this.deduplicator = new EventDeduplicator(
      {
        ttlMs: config.dedupTtlMs,
        maxEntries: config.dedupMaxEntries,
        sweepIntervalMs: config.sweepIntervalMs,
      },
      options.clock ?? monotonicClock,
    );
    this.sender = new MessageSender(this.state, transport);
    this.ai = new AIResponseTrigger({
      state: this.state,
      transport,
      inference,
      deduplicator: this.deduplicator,
      queue: this.queue,
      config,
    });
    this.router = new EventRouter({
      state: this.state,
      transport,
      deduplicator: this.deduplicator,
      ai: this.ai,
      config,
    });
    this.dispatcher = new CommandDispatcher({
      state: this.state,
      transport,
      sender: this.sender,
      ai: this.ai,
    });
  }

  /** Start the periodic dedup sweep. */
  start(): void {
    this.deduplicator.start();
  }

  stop(): void {
    this.deduplicator.stop();
  }

  /** Enqueue an inbound transport event. */
  receive(event: InboundEvent): Promise<boolean | undefined> {
    return this.queue.enqueue(`receive:${event.type}`, () =>
      this.router.route(event),
    );
  }

  /**
   * Enqueue a line typed by the user: a command, or plain text sent to the
   * selected private chat, the current channel, or main.
   */
  submit(input: string): Promise<DispatchResult | undefined> {
    return this.queue.enqueue("submit", () => this.handleInput(input));
  }

  suggest(partialInput: string): CommandSuggestion[] {
    return suggest(partialInput, { currentChannel: this.state.currentChannel });
  }

  private handleInput(input: string): DispatchResult {
    const result = this.dispatcher.dispatch(input, {
      myPeerId: this.transport.myPeerId,
      timestamp: this.wallClock(),
    });
    if (result.handled) return result;

    const text = input.trim();
    if (text.length === 0) return result;

    const peerId = this.state.selectedPrivatePeer;
    if (peerId) {
      const nickname = this.transport.getPeerNicknames().get(peerId) ?? peerId;
      this.sender.sendPrivate(text, peerId, nickname);
      return { handled: true, outboundText: text, target: peerId };
    }

    const channel = this.state.currentChannel;
    this.sender.sendPublic(text, channel);
    return { handled: true, outboundText: text, target: channel };
  }
}
