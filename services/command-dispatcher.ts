import {
  AI_COMMANDS,
  COMMAND_PREFIX,
  findCommand,
  usageOf,
} from "@/services/command-registry";
import { AIResponseTrigger, analysisPrompt } from "@/services/ai-response-trigger";
import { MessageSender } from "@/services/message-sender";
import {
  ASSIGNABLE_ROLES,
  ROLE_ICONS,
  encodeEmergencyAlert,
  encodeRoleUpdate,
  encodeSupplyRequest,
  parseSwarmRole,
  supplyItemOnWire,
} from "@/services/protocol-codec";
import { ChatState } from "@/state/chat-state";
import { CommandSuggestion, Scope, SwarmRole } from "@/types/global";
import { MeshTransport } from "@/types/interface";
import { generateId } from "@/utils/random";

export const SUPPLY_CHANNEL = "#supply-network";
export const EMERGENCY_CHANNEL = "#emergency-network";
const RULE = "━━━━━━━━━━━━━━━━━━━━";

export type DispatchContext = {
  myPeerId: string;
  /** Epoch millis stamped on outbound protocol records */
  timestamp: number;
};

export type DispatchResult = {
  handled: boolean;
  /** Primary text handed to the transport, if any */
  outboundText: string | null;
  /** Channel or peer id the primary text went to; null for main */
  target: string | null;
};

type Outbound = { text: string; target: string | null };

export interface CommandDispatcherDeps {
  state: ChatState;
  transport: MeshTransport;
  sender: MessageSender;
  ai: AIResponseTrigger;
}

export const roleChannel = (role: SwarmRole) => `#${role}-network`;

/**
 * Executes slash commands typed by the local user. Every expected failure
 * (bad arguments, unknown nickname, unknown command) ends in a local system
 * message; nothing here throws for user input.
 */
export class CommandDispatcher {
  private readonly state: ChatState;
  private readonly transport: MeshTransport;
  private readonly sender: MessageSender;
  private readonly ai: AIResponseTrigger;

  constructor(deps: CommandDispatcherDeps) {
    this.state = deps.state;
    this.transport = deps.transport;
    this.sender = deps.sender;
    this.ai = deps.ai;
  }

  dispatch(rawInput: string, context: DispatchContext): DispatchResult {
    if (!rawInput.startsWith(COMMAND_PREFIX)) {
      return { handled: false, outboundText: null, target: null };
    }
    const input = rawInput.trim();

    const [token, ...args] = input.split(/\s+/);
    const command = findCommand(token, {
      currentChannel: this.state.currentChannel,
    });

    if (!command) {
      this.system(`unknown command: ${token}. type / to see available commands.`);
      return { handled: true, outboundText: null, target: null };
    }

    console.log(`[CommandDispatcher] ${command.command} (${args.length} args)`);
    const outbound = this.run(command, token, args, context);

    return {
      handled: true,
      outboundText: outbound?.text ?? null,
      target: outbound?.target ?? null,
    };
  }

  private run(
    command: CommandSuggestion,
    token: string,
    args: string[],
    context: DispatchContext,
  ): Outbound | null {
    const usage = () => {
      this.system(usageOf(command, token));
      return null;
    };

    switch (command.command) {
      case "/j":
        return args.length > 0 ? this.join(args, context) : usage();
      case "/leave":
        return this.leave(args, usage);
      case "/m":
        return args.length > 0 ? this.privateMessage(args) : usage();
      case "/w":
        return this.who();
      case "/channels":
        return this.channels();
      case "/clear":
        return this.clear();
      case "/block":
        return this.block(args);
      case "/unblock":
        return args.length > 0 ? this.unblock(args[0]) : usage();
      case "/hug":
        return args.length > 0
          ? this.action(args[0], "gives", "a warm hug 🫂")
          : usage();
      case "/slap":
        return args.length > 0
          ? this.action(args[0], "slaps", "around a bit with a large trout 🐟")
          : usage();
      case "/role":
        return this.role(args, context, usage);
      case "/supply":
        return args.length > 0 ? this.supply(args.join(" "), context) : usage();
      case "/emergency":
        return args.length > 0
          ? this.emergency(args.join(" "), context)
          : usage();
      case "/status":
        return this.status();
      case "/ai":
        return args.length > 0 ? this.askAI(args.join(" "), context) : usage();
      case "/analyze":
        return args.length > 0 ? this.analyze(args.join(" ")) : usage();
      case "/ai-status":
        return this.aiStatus();
      case "/ai-help":
        return this.aiHelp();
      case "/autorespond":
        return this.autoRespond(args, usage);
      case "/pass":
        return args.length === 1 ? this.password(args[0], context) : usage();
      default:
        throw new Error(`No handler registered for ${command.command}`);
    }
  }

  // ============ Channels ============

  private join(args: string[], context: DispatchContext): Outbound | null {
    const channel = asChannel(args[0]);
    const password = args.length > 1 ? args[1] : null;

    if (!this.state.joinChannel(channel, context.myPeerId, password)) {
      this.system(`wrong password for channel ${channel}.`);
      return null;
    }

    this.system(`joined channel ${channel}`);
    return null;
  }

  private leave(args: string[], usage: () => null): Outbound | null {
    const channel =
      args.length > 0 ? asChannel(args[0]) : this.state.currentChannel;
    if (!channel) return usage();

    if (!this.state.leaveChannel(channel)) {
      this.system(`you are not in channel ${channel}.`);
      return null;
    }

    this.system(`left channel ${channel}`);
    return null;
  }

  private channels(): Outbound | null {
    const joined = this.state.getJoinedChannels();
    this.system(
      joined.length === 0
        ? "no channels joined"
        : `joined channels: ${joined.join(", ")}`,
    );
    return null;
  }

  private clear(): Outbound | null {
    const peerId = this.state.selectedPrivatePeer;
    const channel = this.state.currentChannel;

    if (peerId) {
      this.state.clear({ kind: "private", peerId });
    } else if (channel) {
      this.state.clear({ kind: "channel", channel });
    } else {
      this.state.clear({ kind: "main" });
    }
    return null;
  }

  private password(password: string, context: DispatchContext): Outbound | null {
    const channel = this.state.currentChannel;
    if (!channel) return null;

    const scope: Scope = { kind: "channel", channel };
    if (!this.state.isChannelCreator(channel, context.myPeerId)) {
      this.system("you must be the channel creator to set a password.", scope);
      return null;
    }

    this.state.setChannelPassword(channel, password);
    this.system(`password changed for channel ${channel}`, scope);
    return null;
  }

  // ============ Peers ============

  private privateMessage(args: string[]): Outbound | null {
    const name = stripMention(args[0]);
    const peerId = this.peerIdFor(name);

    if (!peerId) {
      this.notFound(name);
      return null;
    }

    if (this.state.isBlocked(peerId)) {
      this.system(`cannot start chat with ${name}: user is blocked.`);
      return null;
    }

    this.state.selectedPrivatePeer = peerId;

    if (args.length === 1) {
      this.system(`started private chat with ${name}`);
      return null;
    }

    const text = args.slice(1).join(" ");
    this.sender.sendPrivate(text, peerId, name);
    return { text, target: peerId };
  }

  private who(): Outbound | null {
    const nicknames = this.transport.getPeerNicknames();
    const online = this.state
      .getConnectedPeers()
      .map((peerId) => nicknames.get(peerId) ?? peerId);

    this.system(
      online.length === 0
        ? "no one else is online right now."
        : `online users: ${online.join(", ")}`,
    );
    return null;
  }

  private block(args: string[]): Outbound | null {
    if (args.length === 0) {
      const nicknames = this.transport.getPeerNicknames();
      const blocked = this.state
        .getBlocked()
        .map((id) => nicknames.get(id) ?? id);
      this.system(
        blocked.length === 0
          ? "no blocked users."
          : `blocked users: ${blocked.join(", ")}`,
      );
      return null;
    }

    const name = stripMention(args[0]);
    const peerId = this.peerIdFor(name);
    if (!peerId) {
      this.notFound(name);
      return null;
    }

    if (!this.state.blockPeer(peerId)) {
      this.system(`${name} is already blocked.`);
      return null;
    }

    if (this.state.selectedPrivatePeer === peerId) {
      this.state.selectedPrivatePeer = null;
    }
    this.system(`blocked ${name}. you will no longer receive messages from them.`);
    return null;
  }

  private unblock(rawName: string): Outbound | null {
    const name = stripMention(rawName);
    const peerId = this.peerIdFor(name);
    if (!peerId) {
      this.notFound(name);
      return null;
    }

    this.system(
      this.state.unblockPeer(peerId)
        ? `unblocked ${name}.`
        : `${name} is not blocked.`,
    );
    return null;
  }

  private action(rawTarget: string, verb: string, object: string): Outbound {
    const target = stripMention(rawTarget);
    const actor = this.state.nickname || "someone";
    const text = `* ${actor} ${verb} ${target} ${object} *`;

    const privatePeer = this.state.selectedPrivatePeer;
    if (privatePeer) {
      const nickname =
        this.transport.getPeerNicknames().get(privatePeer) ?? privatePeer;
      this.sender.sendPrivate(text, privatePeer, nickname);
      return { text, target: privatePeer };
    }

    const channel = this.state.currentChannel;
    this.sender.sendPublic(text, channel);
    return { text, target: channel };
  }

  // ============ Swarm coordination ============

  private role(
    args: string[],
    context: DispatchContext,
    usage: () => null,
  ): Outbound | null {
    if (args.length === 0) {
      if (this.state.myRole === SwarmRole.UNASSIGNED) return usage();
      this.system(`Current role: ${this.state.myRole}`);
      return null;
    }

    const role = parseSwarmRole(args[0]);
    if (role === null || !ASSIGNABLE_ROLES.includes(role)) {
      this.system(`Invalid role. Use: ${ASSIGNABLE_ROLES.join(", ")}`);
      return null;
    }

    this.state.myRole = role;
    this.state.setPeerRole({
      peerId: context.myPeerId,
      role,
      updatedAt: context.timestamp,
    });

    const text = encodeRoleUpdate(context.myPeerId, role, context.timestamp);
    this.transport.send(text, [], null);

    this.system(
      `${ROLE_ICONS[role]} Your role is now: ${role.toUpperCase()}. Broadcasted to swarm network.`,
    );

    // Joining makes the role channel current, so announce first
    this.state.joinChannel(roleChannel(role), context.myPeerId);
    return { text, target: null };
  }

  private supply(item: string, context: DispatchContext): Outbound {
    const text = encodeSupplyRequest(
      context.myPeerId,
      item,
      context.timestamp,
      this.state.myRole,
    );
    this.transport.send(text, [], null);
    this.transport.send(text, [], SUPPLY_CHANNEL);

    const recorded = supplyItemOnWire(item);
    this.state.recordSupplyRequest({
      peerId: context.myPeerId,
      item: recorded,
      timestamp: context.timestamp,
    });
    this.system(`📦 Supply request '${recorded}' broadcast to swarm network`);
    return { text, target: null };
  }

  private emergency(message: string, context: DispatchContext): Outbound {
    const role = this.state.myRole;
    const text = encodeEmergencyAlert(
      context.myPeerId,
      role,
      message,
      context.timestamp,
    );
    this.transport.send(text, [], null);

    const icon = role === SwarmRole.UNASSIGNED ? "🚨" : ROLE_ICONS[role];
    this.transport.send(
      `${icon} EMERGENCY ALERT: ${message}`,
      [],
      EMERGENCY_CHANNEL,
    );

    this.state.recordEmergencyAlert({
      peerId: context.myPeerId,
      role,
      message,
      timestamp: context.timestamp,
    });
    this.system("🚨 EMERGENCY ALERT broadcasted to all connected devices");
    return { text, target: null };
  }

  private status(): Outbound | null {
    const connected = this.state.getConnectedPeers();
    const nicknames = this.transport.getPeerNicknames();
    const roles = this.state
      .getPeerRoles()
      .filter((r) => r.peerId !== this.transport.myPeerId)
      .map((r) => `${nicknames.get(r.peerId) ?? r.peerId} (${r.role})`);

    const lines = [
      "🔥 SWARM STATUS REPORT",
      RULE,
      `👤 Your Role: ${this.state.myRole.toUpperCase()}`,
      `🤖 AI Capable: ${this.ai.hasUsableModel() ? "✅ YES" : "❌ NO"}`,
      `📡 Connected Peers: ${connected.length}`,
      `🔗 Network Status: ${connected.length > 0 ? "ACTIVE" : "OFFLINE"}`,
    ];
    if (roles.length > 0) {
      lines.push(`🧭 Peer Roles: ${roles.join(", ")}`);
    }
    lines.push(RULE);

    this.system(lines.join("\n"));
    return null;
  }

  // ============ AI ============

  private askAI(prompt: string, context: DispatchContext): Outbound {
    const channel = this.state.currentChannel;
    const scope: Scope = channel ? { kind: "channel", channel } : { kind: "main" };

    this.state.addMessage(scope, {
      id: generateId("msg"),
      sender: this.state.nickname,
      senderPeerId: context.myPeerId,
      content: prompt,
      timestamp: context.timestamp,
      channel,
      isPrivate: false,
      recipientNickname: null,
      deliveryStatus: null,
    });

    const text = `🤖 ${this.state.nickname} is asking AI: "${prompt}"`;
    this.transport.send(text, [], channel);

    this.ai.ask(prompt, channel);
    return { text, target: channel };
  }

  private analyze(situation: string): Outbound | null {
    this.ai.ask(
      analysisPrompt(this.state.myRole, situation),
      this.state.currentChannel,
    );
    return null;
  }

  private aiStatus(): Outbound | null {
    this.system(
      [
        "🤖 EMERGENCY AI STATUS CHECK",
        RULE,
        this.ai.readiness(),
        `🔁 Auto-respond: ${this.state.autoRespond ? "ON" : "OFF"}`,
        RULE,
      ].join("\n"),
    );
    return null;
  }

  private aiHelp(): Outbound | null {
    const lines = AI_COMMANDS.map((c) =>
      c.argHint
        ? `${c.command} ${c.argHint} - ${c.description}`
        : `${c.command} - ${c.description}`,
    );
    this.system(["🤖 AI COMMANDS HELP", RULE, ...lines, RULE].join("\n"));
    return null;
  }

  private autoRespond(args: string[], usage: () => null): Outbound | null {
    if (args.length === 0) {
      this.state.autoRespond = !this.state.autoRespond;
    } else if (args[0] === "on" || args[0] === "off") {
      this.state.autoRespond = args[0] === "on";
    } else {
      return usage();
    }

    this.system(
      `🤖 Auto-respond is now ${this.state.autoRespond ? "ON" : "OFF"}`,
    );
    return null;
  }

  // ============ Helpers ============

  private peerIdFor(nickname: string): string | null {
    for (const [peerId, name] of this.transport.getPeerNicknames()) {
      if (name === nickname) return peerId;
    }
    return null;
  }

  private notFound(name: string) {
    this.system(
      `user '${name}' not found. they may be offline or using a different nickname.`,
    );
  }

  private system(content: string, scope?: Scope) {
    this.state.addSystemMessage(content, scope);
  }
}

const asChannel = (name: string) => (name.startsWith("#") ? name : `#${name}`);

const stripMention = (name: string) =>
  name.startsWith("@") ? name.slice(1) : name;
