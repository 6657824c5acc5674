enum SwarmRole {
  SCOUT = "scout",
  MEDIC = "medic",
  LEADER = "leader",
  HELPER = "helper",
  ANALYST = "analyst",
  UNASSIGNED = "unassigned",
}

// Tracks a message from the moment it is queued locally until the recipient
// has read it. Transitions only move forward (see services/delivery-status).
type DeliveryStatus =
  | { kind: "sending" }
  | { kind: "sent" }
  | { kind: "partiallyDelivered"; reached: number; total: number }
  | { kind: "delivered"; to: string; at: number }
  | { kind: "read"; by: string; at: number }
  | { kind: "failed"; reason: string };

// Represents a user visible message in the swarm chat.
// Handles main, channel and private messages, with delivery tracking.
// - Note this is the primary data model for chat messages
type Message = {
  id: string;
  sender: string;
  senderPeerId: string | null;
  content: string;
  timestamp: number;
  channel: string | null;
  isPrivate: boolean;
  recipientNickname: string | null;
  deliveryStatus: DeliveryStatus | null;
};

// Where a message lives: the main timeline, a named channel, or a private
// conversation keyed by the other peer's id.
type Scope =
  | { kind: "main" }
  | { kind: "channel"; channel: string }
  | { kind: "private"; peerId: string };

type PeerRole = {
  peerId: string;
  role: SwarmRole;
  updatedAt: number;
};

type SupplyRequest = {
  peerId: string;
  item: string;
  timestamp: number;
};

type EmergencyAlert = {
  peerId: string;
  role: SwarmRole;
  message: string;
  timestamp: number;
};

type InboundEvent =
  | { type: "message"; message: Message }
  | { type: "peerConnected"; peerId: string }
  | { type: "peerDisconnected"; peerId: string }
  | { type: "peerListUpdated"; peers: string[] }
  | { type: "channelLeave"; channel: string; peerId: string }
  | {
      type: "deliveryAck";
      messageId: string;
      recipient: string;
      timestamp: number;
    }
  | { type: "readReceipt"; messageId: string; reader: string; timestamp: number };

type CommandSuggestion = {
  command: string;
  aliases: string[];
  argHint: string | null;
  description: string;
};

export {
  CommandSuggestion,
  DeliveryStatus,
  EmergencyAlert,
  InboundEvent,
  Message,
  PeerRole,
  Scope,
  SupplyRequest,
  SwarmRole,
};
