/// ## Embedded Swarm Protocol
/// Coordination records travel as ordinary chat text so that any peer on the
/// mesh can relay them. A record is recognised by a marker at the start of the
/// message, optionally preceded by one decorative symbol token:
///
/// - `🔄 ROLE_UPDATE:<peerId>:<role>:<epochMillis>`
/// - `📦 SUPPLY_REQUEST:<peerId>:<item>:<epochMillis>`
/// - `🚨 EMERGENCY:<peerId>:<role>:<message>:<epochMillis>`
///
/// A marker may carry an explicit version (`ROLE_UPDATE.v1:`). The bare marker
/// is version 1.
///
/// ## Sender Verification
/// Every record names the peer it speaks for. A record is only accepted when
/// that peer id equals the sender reported by the transport, so a peer cannot
/// claim a role, a request or an alert on behalf of someone else.

import {
  EmergencyAlert,
  PeerRole,
  SupplyRequest,
  SwarmRole,
} from "@/types/global";

export const PROTOCOL_VERSION = 1;

export enum ProtocolKind {
  ROLE_UPDATE = "roleUpdate",
  SUPPLY_REQUEST = "supplyRequest",
  EMERGENCY_ALERT = "emergencyAlert",
  PLAIN = "plain",
}

export type ProtocolMessage =
  | { kind: ProtocolKind.PLAIN; content: string }
  | { kind: ProtocolKind.ROLE_UPDATE; update: PeerRole }
  | { kind: ProtocolKind.SUPPLY_REQUEST; request: SupplyRequest }
  | { kind: ProtocolKind.EMERGENCY_ALERT; alert: EmergencyAlert };

const MARKERS: Record<string, ProtocolKind> = {
  ROLE_UPDATE: ProtocolKind.ROLE_UPDATE,
  SUPPLY_REQUEST: ProtocolKind.SUPPLY_REQUEST,
  EMERGENCY: ProtocolKind.EMERGENCY_ALERT,
};

// optional symbol token, marker, optional version tag, body
const RECORD_PATTERN =
  /^(?:[^\s\w]+ )?(ROLE_UPDATE|SUPPLY_REQUEST|EMERGENCY)(?:\.v(\d+))?:([\s\S]*)$/;

export const ROLE_ICONS: Record<SwarmRole, string> = {
  [SwarmRole.SCOUT]: "🔍",
  [SwarmRole.MEDIC]: "🏥",
  [SwarmRole.LEADER]: "⭐",
  [SwarmRole.HELPER]: "🔧",
  [SwarmRole.ANALYST]: "📊",
  [SwarmRole.UNASSIGNED]: "👤",
};

/** Roles a peer can announce. `unassigned` is only ever a local default. */
export const ASSIGNABLE_ROLES: SwarmRole[] = [
  SwarmRole.SCOUT,
  SwarmRole.MEDIC,
  SwarmRole.LEADER,
  SwarmRole.HELPER,
  SwarmRole.ANALYST,
];

export class MalformedPayloadError extends Error {
  constructor(
    readonly marker: string,
    readonly reason: string,
  ) {
    super(`Malformed ${marker} payload: ${reason}`);
    this.name = "MalformedPayloadError";
  }
}

export class SpoofedSenderError extends Error {
  constructor(
    readonly marker: string,
    readonly claimedPeerId: string,
    readonly senderPeerId: string | null,
  ) {
    super(
      `${marker} claims peer ${claimedPeerId} but was sent by ${senderPeerId ?? "an unknown peer"}`,
    );
    this.name = "SpoofedSenderError";
  }
}

export function parseSwarmRole(raw: string): SwarmRole | null {
  const value = raw.trim().toLowerCase();
  const role = Object.values(SwarmRole).find((r) => r === value);
  return role ?? null;
}

export function classify(content: string): ProtocolKind {
  const match = RECORD_PATTERN.exec(content);
  if (!match) return ProtocolKind.PLAIN;
  return MARKERS[match[1]] ?? ProtocolKind.PLAIN;
}

/**
 * Decode message text into a protocol record.
 *
 * @param senderPeerId - sender reported by the transport, null when unknown
 * @throws MalformedPayloadError when the record's fields are invalid
 * @throws SpoofedSenderError when the record speaks for another peer
 */
export function decodeProtocolMessage(
  content: string,
  senderPeerId: string | null,
): ProtocolMessage {
  const match = RECORD_PATTERN.exec(content);
  if (!match) {
    return { kind: ProtocolKind.PLAIN, content };
  }

  const [, marker, version, body] = match;

  if (version !== undefined && Number(version) !== PROTOCOL_VERSION) {
    throw new MalformedPayloadError(marker, `unsupported version ${version}`);
  }

  switch (MARKERS[marker]) {
    case ProtocolKind.ROLE_UPDATE:
      return {
        kind: ProtocolKind.ROLE_UPDATE,
        update: decodeRoleUpdate(marker, body, senderPeerId),
      };

    case ProtocolKind.SUPPLY_REQUEST:
      return {
        kind: ProtocolKind.SUPPLY_REQUEST,
        request: decodeSupplyRequest(marker, body, senderPeerId),
      };

    case ProtocolKind.EMERGENCY_ALERT:
      return {
        kind: ProtocolKind.EMERGENCY_ALERT,
        alert: decodeEmergencyAlert(marker, body, senderPeerId),
      };

    default:
      throw new Error(`No decoder registered for marker ${marker}`);
  }
}

const decodeRoleUpdate = (
  marker: string,
  body: string,
  senderPeerId: string | null,
): PeerRole => {
  const fields = body.split(":");
  if (fields.length !== 3) {
    throw new MalformedPayloadError(
      marker,
      `expected 3 fields, got ${fields.length}`,
    );
  }

  const [peerId, rawRole, rawTimestamp] = fields;
  requirePeerId(marker, peerId);

  const role = parseSwarmRole(rawRole);
  if (role === null || !ASSIGNABLE_ROLES.includes(role)) {
    throw new MalformedPayloadError(marker, `unknown role "${rawRole}"`);
  }

  const updatedAt = parseTimestamp(marker, rawTimestamp);
  verifySender(marker, peerId, senderPeerId);

  return { peerId, role, updatedAt };
};

const decodeSupplyRequest = (
  marker: string,
  body: string,
  senderPeerId: string | null,
): SupplyRequest => {
  const fields = body.split(":");
  if (fields.length !== 3) {
    throw new MalformedPayloadError(
      marker,
      `expected 3 fields, got ${fields.length}`,
    );
  }

  const [peerId, item, rawTimestamp] = fields;
  requirePeerId(marker, peerId);

  if (item.trim().length === 0) {
    throw new MalformedPayloadError(marker, "empty item");
  }

  const timestamp = parseTimestamp(marker, rawTimestamp);
  verifySender(marker, peerId, senderPeerId);

  return { peerId, item: item.trim(), timestamp };
};

// The alert text may itself contain colons: peer id and role are the first
// two fields, the timestamp is the last, and everything between is the text.
const decodeEmergencyAlert = (
  marker: string,
  body: string,
  senderPeerId: string | null,
): EmergencyAlert => {
  const fields = body.split(":");
  if (fields.length < 4) {
    throw new MalformedPayloadError(
      marker,
      `expected at least 4 fields, got ${fields.length}`,
    );
  }

  const peerId = fields[0];
  const rawRole = fields[1];
  const rawTimestamp = fields[fields.length - 1];
  const message = fields.slice(2, -1).join(":");

  requirePeerId(marker, peerId);

  const role =
    rawRole.trim() === "" ? SwarmRole.UNASSIGNED : parseSwarmRole(rawRole);
  if (role === null) {
    throw new MalformedPayloadError(marker, `unknown role "${rawRole}"`);
  }

  const timestamp = parseTimestamp(marker, rawTimestamp);
  verifySender(marker, peerId, senderPeerId);

  return { peerId, role, message, timestamp };
};

const requirePeerId = (marker: string, peerId: string): void => {
  if (peerId.trim().length === 0) {
    throw new MalformedPayloadError(marker, "empty peer id");
  }
};

const parseTimestamp = (marker: string, raw: string): number => {
  if (!/^\d+$/.test(raw)) {
    throw new MalformedPayloadError(marker, `non-numeric timestamp "${raw}"`);
  }
  return Number(raw);
};

const verifySender = (
  marker: string,
  claimedPeerId: string,
  senderPeerId: string | null,
): void => {
  if (senderPeerId === null || claimedPeerId !== senderPeerId) {
    throw new SpoofedSenderError(marker, claimedPeerId, senderPeerId);
  }
};

export function encodeRoleUpdate(
  peerId: string,
  role: SwarmRole,
  timestamp: number,
): string {
  return `🔄 ROLE_UPDATE:${peerId}:${role}:${timestamp}`;
}

/** Colons inside the item would shift the timestamp field, so they become spaces. */
export function encodeSupplyRequest(
  peerId: string,
  item: string,
  timestamp: number,
  senderRole: SwarmRole = SwarmRole.UNASSIGNED,
): string {
  const icon =
    senderRole === SwarmRole.UNASSIGNED ? "📦" : ROLE_ICONS[senderRole];
  return `${icon} SUPPLY_REQUEST:${peerId}:${supplyItemOnWire(item)}:${timestamp}`;
}

/** Colons delimit fields, so they cannot appear in an item. */
export function supplyItemOnWire(item: string): string {
  return item.replace(/:/g, " ");
}

export function encodeEmergencyAlert(
  peerId: string,
  role: SwarmRole,
  message: string,
  timestamp: number,
): string {
  return `🚨 EMERGENCY:${peerId}:${role}:${message}:${timestamp}`;
}
