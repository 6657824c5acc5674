import { ChatState } from "@/state/chat-state";
import { Message, Scope } from "@/types/global";
import { MeshTransport } from "@/types/interface";
import { generateId } from "@/utils/random";

const errorText = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Sends text authored by the local user. The message is appended locally
 * first (status `sending`), handed to the transport, then marked `sent`.
 * A transport that throws marks the message `failed`.
 */
export class MessageSender {
  constructor(
    private readonly state: ChatState,
    private readonly transport: MeshTransport,
  ) {}

  /** Broadcast to main or a channel and track acknowledgements from its peers. */
  sendPublic(content: string, channel: string | null): Message {
    const message = this.localMessage(content, channel, false, null);
    const scope: Scope = channel ? { kind: "channel", channel } : { kind: "main" };

    this.state.addMessage(scope, message);
    this.state.trackDelivery(message.id, this.recipientsOf(channel));

    try {
      this.transport.send(content, mentionsIn(content), channel);
      this.state.applyDeliveryStatus(message.id, { kind: "sent" });
    } catch (error) {
      console.error("[MessageSender] Broadcast failed:", error);
      this.state.applyDeliveryStatus(message.id, {
        kind: "failed",
        reason: errorText(error),
      });
    }

    return message;
  }

  sendPrivate(content: string, peerId: string, recipientNickname: string): Message {
    const message = this.localMessage(content, null, true, recipientNickname);
    this.state.addMessage({ kind: "private", peerId }, message);

    try {
      this.transport.sendPrivate(content, peerId, recipientNickname, message.id);
      this.state.applyDeliveryStatus(message.id, { kind: "sent" });
    } catch (error) {
      console.error(`[MessageSender] Private send to ${peerId} failed:`, error);
      this.state.applyDeliveryStatus(message.id, {
        kind: "failed",
        reason: errorText(error),
      });
    }

    return message;
  }

  private recipientsOf(channel: string | null): string[] {
    const me = this.transport.myPeerId;
    const peers = channel
      ? this.state.getChannelMembers(channel)
      : this.state.getConnectedPeers();
    return peers.filter((p) => p !== me);
  }

  private localMessage(
    content: string,
    channel: string | null,
    isPrivate: boolean,
    recipientNickname: string | null,
  ): Message {
    return {
      id: generateId("msg"),
      sender: this.state.nickname,
      senderPeerId: this.transport.myPeerId,
      content,
      timestamp: Date.now(),
      channel,
      isPrivate,
      recipientNickname,
      deliveryStatus: { kind: "sending" },
    };
  }
}

/** Nicknames mentioned as `@name` in the text. */
export function mentionsIn(content: string): string[] {
  const mentions = new Set<string>();
  for (const match of content.matchAll(/@([\w-]+)/g)) {
    mentions.add(match[1]);
  }
  return [...mentions];
}
