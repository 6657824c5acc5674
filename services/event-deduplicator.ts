import TTLCache, { Clock, monotonicClock } from "@/cache/ttl-cache";
import { Message } from "@/types/global";
import { quickHashText } from "@/utils/hash";

export interface EventDeduplicatorConfig {
  /** Default retention of a processed key */
  ttlMs: number;
  /** Maximum keys tracked concurrently */
  maxEntries: number;
  /** Periodic sweep interval */
  sweepIntervalMs: number;
}

export const DEFAULT_DEDUPLICATOR_CONFIG: EventDeduplicatorConfig = {
  ttlMs: 60 * 1000, // 1 minute
  maxEntries: 1000,
  sweepIntervalMs: 30 * 1000, // 30 seconds
};

export type ConnectionEventType = "connect" | "disconnect";
export type ReceiptKind = "ack" | "read";

/**
 * Key for a chat message. The same logical message delivered over two mesh
 * paths carries the same sender, timestamp and content.
 */
export function messageKey(message: Message): string {
  const sender = message.senderPeerId ?? message.sender;
  return `msg:${sender}:${message.timestamp}:${quickHashText(message.content)}`;
}

/**
 * Key for a connect/disconnect notification. Paired with a short TTL it
 * collapses the burst of duplicates a dual-path connection produces.
 */
export function connectionKey(
  type: ConnectionEventType,
  peerId: string,
): string {
  return `peer:${type}:${peerId}`;
}

export function receiptKey(
  kind: ReceiptKind,
  messageId: string,
  peer: string,
): string {
  return `${kind}:${messageId}:${peer}`;
}

/**
 * Key for a coordination record. The same record is often broadcast to main
 * and to a coordination channel; both copies map to one key.
 */
export function recordKey(
  kind: string,
  peerId: string,
  timestamp: number,
): string {
  return `record:${kind}:${peerId}:${timestamp}`;
}

export function aiClaimKey(messageId: string): string {
  return `ai:${messageId}`;
}

/**
 * Filters repeated inbound events. Never throws: an unexpected burst of
 * distinct keys is bounded by the cache's size cap.
 */
export class EventDeduplicator {
  private readonly cache: TTLCache;
  private readonly config: EventDeduplicatorConfig;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    config: Partial<EventDeduplicatorConfig> = {},
    now: Clock = monotonicClock,
  ) {
    this.config = { ...DEFAULT_DEDUPLICATOR_CONFIG, ...config };
    this.cache = new TTLCache(this.config.ttlMs, this.config.maxEntries, now);
  }

  /**
   * Returns true and records the key the first time it is seen within its
   * retention window, false for a repeat.
   */
  shouldProcess(key: string, ttlMs?: number): boolean {
    if (this.cache.has(key)) {
      return false;
    }
    this.cache.add(key, ttlMs);
    return true;
  }

  /** Drop a recorded key so its next occurrence is processed again. */
  forget(key: string): void {
    this.cache.delete(key);
  }

  /**
   * Start the periodic sweep of expired keys
   */
  start(): void {
    this.stop();

    this.sweepTimer = setInterval(
      () => this.sweep(),
      this.config.sweepIntervalMs,
    );
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  sweep(): number {
    return this.cache.pruneExpired();
  }

  get size(): number {
    return this.cache.size;
  }
}
