import EventEmitter from "eventemitter3";

import { advanceStatus } from "@/services/delivery-status";
import {
  DeliveryStatus,
  EmergencyAlert,
  Message,
  PeerRole,
  Scope,
  SupplyRequest,
  SwarmRole,
} from "@/types/global";
import { generateId } from "@/utils/random";

export const SYSTEM_SENDER = "system";

const COORDINATION_LOG_CAPACITY = 100;

type DeliveryTracker = {
  expected: Set<string>;
  reached: Set<string>;
};

/**
 * In-memory aggregate of everything the chat knows: peers, channels, message
 * lists, roles and local preferences.
 *
 * There is a single logical owner. All mutation goes through the EventRouter
 * or the CommandDispatcher, both of which run on the serialized event queue.
 * Listeners are notified after each change so views can re-render.
 */
export class ChatState extends EventEmitter {
  nickname: string;
  myRole: SwarmRole = SwarmRole.UNASSIGNED;
  autoRespond: boolean;
  currentChannel: string | null = null;
  selectedPrivatePeer: string | null = null;

  private connectedPeers = new Set<string>();
  private joinedChannels = new Set<string>();
  private channelCreators = new Map<string, string>();
  private channelPasswords = new Map<string, string>();
  private channelMembers = new Map<string, Set<string>>();

  private mainMessages: Message[] = [];
  private channelMessages = new Map<string, Message[]>();
  private privateMessages = new Map<string, Message[]>();
  private messagesById = new Map<string, Message>();
  private deliveryTrackers = new Map<string, DeliveryTracker>();

  private peerRoles = new Map<string, PeerRole>();
  private fingerprints = new Map<string, string>();
  private favorites = new Set<string>();
  private blocked = new Set<string>();

  private supplyRequests: SupplyRequest[] = [];
  private emergencyAlerts: EmergencyAlert[] = [];

  constructor(nickname: string, autoRespond: boolean = false) {
    super();
    this.nickname = nickname;
    this.autoRespond = autoRespond;
  }

  // ============ Peers ============

  getConnectedPeers(): string[] {
    return [...this.connectedPeers];
  }

  isPeerConnected(peerId: string): boolean {
    return this.connectedPeers.has(peerId);
  }

  /** @returns false when the peer was already connected */
  addConnectedPeer(peerId: string): boolean {
    if (this.connectedPeers.has(peerId)) return false;
    this.connectedPeers.add(peerId);
    this.notifyPeersChanged();
    return true;
  }

  /** @returns false when the peer was not connected */
  removeConnectedPeer(peerId: string): boolean {
    if (!this.connectedPeers.delete(peerId)) return false;
    this.notifyPeersChanged();
    return true;
  }

  setConnectedPeers(peers: string[]): void {
    this.connectedPeers = new Set(peers);
    this.notifyPeersChanged();
  }

  // ============ Channels ============

  getJoinedChannels(): string[] {
    return [...this.joinedChannels];
  }

  isJoined(channel: string): boolean {
    return this.joinedChannels.has(channel);
  }

  /**
   * Join (or create) a channel and make it current. The first local joiner of
   * an unknown channel becomes its creator.
   *
   * @returns false when the channel is password protected and the password does not match
   */
  joinChannel(
    channel: string,
    myPeerId: string,
    password: string | null = null,
  ): boolean {
    const expected = this.channelPasswords.get(channel);
    if (expected !== undefined && expected !== password) {
      return false;
    }

    if (!this.joinedChannels.has(channel)) {
      this.joinedChannels.add(channel);
      this.channelMessages.set(channel, this.channelMessages.get(channel) ?? []);
      if (!this.channelCreators.has(channel)) {
        this.channelCreators.set(channel, myPeerId);
      }
    }

    this.addChannelMember(channel, myPeerId);
    this.currentChannel = channel;
    this.selectedPrivatePeer = null;
    this.notifyChannelsChanged();
    return true;
  }

  /** @returns false when the channel was not joined */
  leaveChannel(channel: string): boolean {
    if (!this.joinedChannels.delete(channel)) return false;

    for (const message of this.channelMessages.get(channel) ?? []) {
      this.messagesById.delete(message.id);
    }
    this.channelMessages.delete(channel);
    this.channelMembers.delete(channel);

    if (this.currentChannel === channel) {
      this.currentChannel = null;
    }

    this.notifyChannelsChanged();
    return true;
  }

  getChannelMembers(channel: string): string[] {
    return [...(this.channelMembers.get(channel) ?? [])];
  }

  addChannelMember(channel: string, peerId: string): void {
    const members = this.channelMembers.get(channel) ?? new Set<string>();
    members.add(peerId);
    this.channelMembers.set(channel, members);
  }

  removeChannelMember(channel: string, peerId: string): void {
    this.channelMembers.get(channel)?.delete(peerId);
  }

  /** Drop channel members that are no longer connected (we always stay). */
  cleanupDisconnectedMembers(connected: string[], myPeerId: string): void {
    const keep = new Set([...connected, myPeerId]);
    for (const members of this.channelMembers.values()) {
      for (const peerId of [...members]) {
        if (!keep.has(peerId)) members.delete(peerId);
      }
    }
  }

  isChannelCreator(channel: string, peerId: string): boolean {
    return this.channelCreators.get(channel) === peerId;
  }

  setChannelPassword(channel: string, password: string): void {
    this.channelPasswords.set(channel, password);
  }

  // ============ Messages ============

  /**
   * Append a message to the list for `scope`.
   *
   * @returns false when a message with the same id already exists
   */
  addMessage(scope: Scope, message: Message): boolean {
    if (this.messagesById.has(message.id)) return false;

    this.listFor(scope).push(message);
    this.messagesById.set(message.id, message);
    this.notifyMessagesChanged();
    return true;
  }

  addSystemMessage(content: string, scope: Scope = { kind: "main" }): Message {
    const message: Message = {
      id: generateId("system"),
      sender: SYSTEM_SENDER,
      senderPeerId: null,
      content,
      timestamp: Date.now(),
      channel: scope.kind === "channel" ? scope.channel : null,
      isPrivate: scope.kind === "private",
      recipientNickname: null,
      deliveryStatus: null,
    };
    this.addMessage(scope, message);
    return message;
  }

  getMessages(scope: Scope): readonly Message[] {
    switch (scope.kind) {
      case "main":
        return this.mainMessages;
      case "channel":
        return this.channelMessages.get(scope.channel) ?? [];
      case "private":
        return this.privateMessages.get(scope.peerId) ?? [];
    }
  }

  findMessage(id: string): Message | undefined {
    return this.messagesById.get(id);
  }

  /** Replace the content of a message in place (used for streamed AI text). */
  updateMessageContent(id: string, content: string): boolean {
    const message = this.messagesById.get(id);
    if (!message) return false;

    message.content = content;
    this.notifyMessagesChanged();
    return true;
  }

  /**
   * Apply a delivery status, ignoring any transition that would move backward.
   *
   * @returns true when the stored status changed
   */
  applyDeliveryStatus(id: string, status: DeliveryStatus): boolean {
    const message = this.messagesById.get(id);
    if (!message) return false;

    const next = advanceStatus(message.deliveryStatus, status);
    if (next === message.deliveryStatus) return false;

    message.deliveryStatus = next;
    this.notifyMessagesChanged();
    return true;
  }

  /** Expect acknowledgements from every peer in `recipients` for a broadcast. */
  trackDelivery(messageId: string, recipients: string[]): void {
    this.deliveryTrackers.set(messageId, {
      expected: new Set(recipients),
      reached: new Set(),
    });
  }

  /**
   * Record a delivery acknowledgement. Broadcasts with several expected
   * recipients become partially delivered until the last one acknowledges.
   *
   * @returns false when the message is unknown, the recipient was not
   * expected, or the status did not change
   */
  recordDeliveryAck(
    messageId: string,
    recipient: string,
    timestamp: number,
  ): boolean {
    if (!this.messagesById.has(messageId)) return false;

    const tracker = this.deliveryTrackers.get(messageId);
    if (!tracker || tracker.expected.size <= 1) {
      return this.applyDeliveryStatus(messageId, {
        kind: "delivered",
        to: recipient,
        at: timestamp,
      });
    }

    if (!tracker.expected.has(recipient)) return false;

    tracker.reached.add(recipient);
    const total = tracker.expected.size;
    const reached = tracker.reached.size;

    if (reached >= total) {
      this.deliveryTrackers.delete(messageId);
      return this.applyDeliveryStatus(messageId, {
        kind: "delivered",
        to: recipient,
        at: timestamp,
      });
    }

    return this.applyDeliveryStatus(messageId, {
      kind: "partiallyDelivered",
      reached,
      total,
    });
  }

  clear(scope: Scope): void {
    const list = this.listFor(scope);
    for (const message of list) {
      this.messagesById.delete(message.id);
      this.deliveryTrackers.delete(message.id);
    }
    list.length = 0;
    this.notifyMessagesChanged();
  }

  private listFor(scope: Scope): Message[] {
    switch (scope.kind) {
      case "main":
        return this.mainMessages;

      case "channel": {
        const list = this.channelMessages.get(scope.channel) ?? [];
        this.channelMessages.set(scope.channel, list);
        return list;
      }

      case "private": {
        const list = this.privateMessages.get(scope.peerId) ?? [];
        this.privateMessages.set(scope.peerId, list);
        return list;
      }
    }
  }

  // ============ Roles ============

  getPeerRole(peerId: string): PeerRole | undefined {
    return this.peerRoles.get(peerId);
  }

  getPeerRoles(): PeerRole[] {
    return [...this.peerRoles.values()];
  }

  /**
   * Last write wins by `updatedAt`; an update no newer than the stored one is ignored.
   *
   * @returns true when the role table changed
   */
  setPeerRole(update: PeerRole): boolean {
    const existing = this.peerRoles.get(update.peerId);
    if (existing && existing.updatedAt >= update.updatedAt) {
      return false;
    }

    this.peerRoles.set(update.peerId, { ...update });
    this.emit("roles:changed");
    return true;
  }

  // ============ Identity & preferences ============

  setFingerprint(peerId: string, fingerprint: string): void {
    this.fingerprints.set(peerId, fingerprint);
  }

  getFingerprint(peerId: string): string | undefined {
    return this.fingerprints.get(peerId);
  }

  /** @returns whether the peer is a favorite after the toggle */
  toggleFavorite(peerId: string): boolean {
    const key = this.identityOf(peerId);
    if (this.favorites.delete(key)) return false;
    this.favorites.add(key);
    return true;
  }

  isFavorite(peerId: string): boolean {
    return this.favorites.has(this.identityOf(peerId));
  }

  /** Blocks follow the peer's fingerprint when one is known. */
  blockPeer(peerId: string): boolean {
    const key = this.identityOf(peerId);
    if (this.blocked.has(key)) return false;
    this.blocked.add(key);
    return true;
  }

  unblockPeer(peerId: string): boolean {
    return this.blocked.delete(this.identityOf(peerId));
  }

  isBlocked(peerId: string): boolean {
    return this.blocked.has(this.identityOf(peerId));
  }

  getBlocked(): string[] {
    return [...this.blocked];
  }

  private identityOf(peerId: string): string {
    return this.fingerprints.get(peerId) ?? peerId;
  }

  // ============ Coordination logs ============

  recordSupplyRequest(request: SupplyRequest): void {
    this.supplyRequests.push(request);
    if (this.supplyRequests.length > COORDINATION_LOG_CAPACITY) {
      this.supplyRequests.shift();
    }
  }

  getSupplyRequests(): readonly SupplyRequest[] {
    return this.supplyRequests;
  }

  recordEmergencyAlert(alert: EmergencyAlert): void {
    this.emergencyAlerts.push(alert);
    if (this.emergencyAlerts.length > COORDINATION_LOG_CAPACITY) {
      this.emergencyAlerts.shift();
    }
  }

  getEmergencyAlerts(): readonly EmergencyAlert[] {
    return this.emergencyAlerts;
  }

  // ============ Change notifications ============

  notifyMessagesChanged() {
    this.emit("messages:changed");
  }

  onMessagesChanged(callback: () => void) {
    this.on("messages:changed", callback);
  }

  notifyPeersChanged() {
    this.emit("peers:changed");
  }

  onPeersChanged(callback: () => void) {
    this.on("peers:changed", callback);
  }

  notifyChannelsChanged() {
    this.emit("channels:changed");
  }

  onChannelsChanged(callback: () => void) {
    this.on("channels:changed", callback);
  }

  onRolesChanged(callback: () => void) {
    this.on("roles:changed", callback);
  }
}
