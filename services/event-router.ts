import { CoreConfig } from "@/config/config-schema";
import { AIResponseTrigger } from "@/services/ai-response-trigger";
import {
  ConnectionEventType,
  EventDeduplicator,
  connectionKey,
  messageKey,
  receiptKey,
  recordKey,
} from "@/services/event-deduplicator";
import {
  MalformedPayloadError,
  ProtocolKind,
  ProtocolMessage,
  SpoofedSenderError,
  decodeProtocolMessage,
} from "@/services/protocol-codec";
import { ChatState } from "@/state/chat-state";
import { InboundEvent, Message, Scope } from "@/types/global";
import { MeshTransport } from "@/types/interface";

export interface EventRouterDeps {
  state: ChatState;
  transport: MeshTransport;
  deduplicator: EventDeduplicator;
  ai: AIResponseTrigger;
  config: Pick<CoreConfig, "connectionWindowMs">;
}

/**
 * Single entry point for inbound transport events. Must only be called from
 * the serialized event queue.
 */
export class EventRouter {
  private readonly state: ChatState;
  private readonly transport: MeshTransport;
  private readonly deduplicator: EventDeduplicator;
  private readonly ai: AIResponseTrigger;
  private readonly connectionWindowMs: number;

  constructor(deps: EventRouterDeps) {
    this.state = deps.state;
    this.transport = deps.transport;
    this.deduplicator = deps.deduplicator;
    this.ai = deps.ai;
    this.connectionWindowMs = deps.config.connectionWindowMs;
  }

  /**
   * @returns true when the event changed the chat state
   */
  route(event: InboundEvent): boolean {
    switch (event.type) {
      case "message":
        return this.routeMessage(event.message);

      case "peerConnected":
        return this.routeConnection("connect", event.peerId);

      case "peerDisconnected":
        return this.routeConnection("disconnect", event.peerId);

      case "peerListUpdated":
        return this.routePeerList(event.peers);

      case "channelLeave":
        this.state.removeChannelMember(event.channel, event.peerId);
        return true;

      case "deliveryAck":
        if (
          !this.deduplicator.shouldProcess(
            receiptKey("ack", event.messageId, event.recipient),
          )
        ) {
          return false;
        }
        return this.state.recordDeliveryAck(
          event.messageId,
          event.recipient,
          event.timestamp,
        );

      case "readReceipt":
        if (
          !this.deduplicator.shouldProcess(
            receiptKey("read", event.messageId, event.reader),
          )
        ) {
          return false;
        }
        return this.state.applyDeliveryStatus(event.messageId, {
          kind: "read",
          by: event.reader,
          at: event.timestamp,
        });
    }
  }

  private routeConnection(type: ConnectionEventType, peerId: string): boolean {
    if (
      !this.deduplicator.shouldProcess(
        connectionKey(type, peerId),
        this.connectionWindowMs,
      )
    ) {
      return false;
    }

    const changed =
      type === "connect"
        ? this.state.addConnectedPeer(peerId)
        : this.state.removeConnectedPeer(peerId);
    if (!changed) return false;

    // A real state change ends the window for the opposite notification
    this.deduplicator.forget(
      connectionKey(type === "connect" ? "disconnect" : "connect", peerId),
    );

    if (type === "disconnect") {
      this.state.cleanupDisconnectedMembers(
        this.state.getConnectedPeers(),
        this.transport.myPeerId,
      );
    }

    const name = this.transport.getPeerNicknames().get(peerId) ?? peerId;
    const verb = type === "connect" ? "connected" : "disconnected";
    console.log(`[EventRouter] ${peerId} ${verb}`);
    this.state.addSystemMessage(`${name} ${verb}`);
    return true;
  }

  private routePeerList(peers: string[]): boolean {
    this.state.setConnectedPeers(peers);
    this.state.cleanupDisconnectedMembers(peers, this.transport.myPeerId);

    const selected = this.state.selectedPrivatePeer;
    if (selected && !peers.includes(selected)) {
      this.state.selectedPrivatePeer = null;
    }
    return true;
  }

  private routeMessage(message: Message): boolean {
    if (!this.deduplicator.shouldProcess(messageKey(message))) {
      return false;
    }

    const senderPeerId = message.senderPeerId;
    if (senderPeerId && this.state.isBlocked(senderPeerId)) {
      return false;
    }

    let decoded: ProtocolMessage;
    try {
      decoded = decodeProtocolMessage(message.content, senderPeerId);
    } catch (error) {
      if (
        error instanceof MalformedPayloadError ||
        error instanceof SpoofedSenderError
      ) {
        console.warn(`[EventRouter] Dropped record: ${error.message}`);
        return false;
      }
      throw error;
    }

    if (decoded.kind !== ProtocolKind.PLAIN) {
      return this.applyRecord(decoded);
    }

    const scope = this.scopeFor(message);
    if (!scope) return false;

    if (!this.state.addMessage(scope, message)) return false;

    if (scope.kind === "channel" && senderPeerId) {
      this.state.addChannelMember(scope.channel, senderPeerId);
    }

    if (!message.isPrivate) {
      this.ai.maybeRespond(message);
    }
    return true;
  }

  // Channel messages only land in channels we have joined
  private scopeFor(message: Message): Scope | null {
    if (message.isPrivate) {
      return { kind: "private", peerId: message.senderPeerId ?? message.sender };
    }
    if (message.channel) {
      return this.state.isJoined(message.channel)
        ? { kind: "channel", channel: message.channel }
        : null;
    }
    return { kind: "main" };
  }

  private applyRecord(record: ProtocolMessage): boolean {
    switch (record.kind) {
      case ProtocolKind.ROLE_UPDATE: {
        const { peerId, role } = record.update;
        const changed = this.state.setPeerRole(record.update);
        if (changed) {
          console.log(`[EventRouter] Updated role for ${peerId}: ${role}`);
        }
        return changed;
      }

      case ProtocolKind.SUPPLY_REQUEST: {
        const { peerId, item, timestamp } = record.request;
        if (
          !this.deduplicator.shouldProcess(
            recordKey(record.kind, peerId, timestamp),
          )
        ) {
          return false;
        }
        console.log(`[EventRouter] Supply request from ${peerId}: ${item}`);
        this.state.recordSupplyRequest(record.request);
        return true;
      }

      case ProtocolKind.EMERGENCY_ALERT: {
        const { peerId, timestamp } = record.alert;
        if (
          !this.deduplicator.shouldProcess(
            recordKey(record.kind, peerId, timestamp),
          )
        ) {
          return false;
        }
        console.log(`[EventRouter] Emergency alert from ${peerId}`);
        this.state.recordEmergencyAlert(record.alert);
        return true;
      }

      case ProtocolKind.PLAIN:
        return false;
    }
  }
}
