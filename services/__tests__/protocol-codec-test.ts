import { SwarmRole } from "@/types/global";
import {
  MalformedPayloadError,
  ProtocolKind,
  SpoofedSenderError,
  classify,
  decodeProtocolMessage,
  encodeEmergencyAlert,
  encodeRoleUpdate,
  encodeSupplyRequest,
  parseSwarmRole,
} from "../protocol-codec";

describe("classify", () => {
  it("recognises bare and decorated markers", () => {
    expect(classify("ROLE_UPDATE:P1:medic:1000")).toBe(ProtocolKind.ROLE_UPDATE);
    expect(classify("🔄 ROLE_UPDATE:P1:medic:1000")).toBe(
      ProtocolKind.ROLE_UPDATE,
    );
    expect(classify("🏥 SUPPLY_REQUEST:P1:water:1")).toBe(
      ProtocolKind.SUPPLY_REQUEST,
    );
    expect(classify("EMERGENCY.v1:P1:leader:go:1")).toBe(
      ProtocolKind.EMERGENCY_ALERT,
    );
  });

  it("treats everything else as plain text", () => {
    expect(classify("hello ROLE_UPDATE:P1:medic:1000")).toBe(ProtocolKind.PLAIN);
    expect(classify("EMERGENCY ALERT: fire")).toBe(ProtocolKind.PLAIN);
    expect(classify("")).toBe(ProtocolKind.PLAIN);
  });
});

describe("decodeProtocolMessage", () => {
  it("decodes a role update from its own peer", () => {
    expect(decodeProtocolMessage("🔄 ROLE_UPDATE:P1:medic:1000", "P1")).toEqual({
      kind: ProtocolKind.ROLE_UPDATE,
      update: { peerId: "P1", role: SwarmRole.MEDIC, updatedAt: 1000 },
    });
  });

  it("rejects a role update claimed for another peer", () => {
    expect(() => decodeProtocolMessage("ROLE_UPDATE:P1:medic:1000", "P2")).toThrow(
      SpoofedSenderError,
    );
    expect(() => decodeProtocolMessage("ROLE_UPDATE:P1:medic:1000", null)).toThrow(
      SpoofedSenderError,
    );
  });

  it("rejects malformed role updates", () => {
    const bad = [
      "ROLE_UPDATE:P1:medic",
      "ROLE_UPDATE:P1:medic:10:00",
      "ROLE_UPDATE:P1:pilot:1000",
      "ROLE_UPDATE:P1:unassigned:1000",
      "ROLE_UPDATE:P1:medic:soon",
      "ROLE_UPDATE::medic:1000",
    ];
    for (const content of bad) {
      expect(() => decodeProtocolMessage(content, "P1")).toThrow(
        MalformedPayloadError,
      );
    }
  });

  it("rejects an unsupported version", () => {
    expect(() => decodeProtocolMessage("ROLE_UPDATE.v2:P1:medic:1000", "P1")).toThrow(
      "Malformed ROLE_UPDATE payload: unsupported version 2",
    );
  });

  it("decodes a supply request", () => {
    expect(decodeProtocolMessage("📦 SUPPLY_REQUEST:P1: water :5", "P1")).toEqual({
      kind: ProtocolKind.SUPPLY_REQUEST,
      request: { peerId: "P1", item: "water", timestamp: 5 },
    });
  });

  it("keeps colons inside an emergency message", () => {
    expect(
      decodeProtocolMessage(
        "EMERGENCY:P1:leader:evac now: north exit:1700000000000",
        "P1",
      ),
    ).toEqual({
      kind: ProtocolKind.EMERGENCY_ALERT,
      alert: {
        peerId: "P1",
        role: SwarmRole.LEADER,
        message: "evac now: north exit",
        timestamp: 1700000000000,
      },
    });
  });

  it("reads an empty emergency role as unassigned", () => {
    expect(decodeProtocolMessage("🚨 EMERGENCY:P1::help:3", "P1")).toEqual({
      kind: ProtocolKind.EMERGENCY_ALERT,
      alert: {
        peerId: "P1",
        role: SwarmRole.UNASSIGNED,
        message: "help",
        timestamp: 3,
      },
    });
  });

  it("rejects an emergency alert with too few fields", () => {
    expect(() => decodeProtocolMessage("EMERGENCY:P1:leader:3", "P1")).toThrow(
      "Malformed EMERGENCY payload: expected at least 4 fields, got 3",
    );
  });

  it("passes plain text through", () => {
    expect(decodeProtocolMessage("good morning", null)).toEqual({
      kind: ProtocolKind.PLAIN,
      content: "good morning",
    });
  });
});

describe("encoders", () => {
  it("emits the decorated wire forms", () => {
    expect(encodeRoleUpdate("P1", SwarmRole.SCOUT, 10)).toBe(
      "🔄 ROLE_UPDATE:P1:scout:10",
    );
    expect(encodeSupplyRequest("P1", "water", 10)).toBe(
      "📦 SUPPLY_REQUEST:P1:water:10",
    );
    expect(encodeSupplyRequest("P1", "splints", 10, SwarmRole.MEDIC)).toBe(
      "🏥 SUPPLY_REQUEST:P1:splints:10",
    );
    expect(encodeEmergencyAlert("P1", SwarmRole.LEADER, "evac: now", 10)).toBe(
      "🚨 EMERGENCY:P1:leader:evac: now:10",
    );
  });

  it("replaces colons in a supply item so the record still decodes", () => {
    const wire = encodeSupplyRequest("P1", "batteries: AA", 10);
    expect(wire).toBe("📦 SUPPLY_REQUEST:P1:batteries  AA:10");
    expect(decodeProtocolMessage(wire, "P1")).toEqual({
      kind: ProtocolKind.SUPPLY_REQUEST,
      request: { peerId: "P1", item: "batteries  AA", timestamp: 10 },
    });
  });
});

test("parseSwarmRole ignores case and surrounding space", () => {
  expect(parseSwarmRole(" Medic ")).toBe(SwarmRole.MEDIC);
  expect(parseSwarmRole("pilot")).toBeNull();
});
