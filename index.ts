import { CoreConfig, parseCoreConfig } from "@/config/config-schema";
import { ChatCore } from "@/services/chat-core";
import { InferenceService, MeshTransport } from "@/types/interface";

export * from "@/types/global";
export * from "@/types/interface";
export { CoreConfig, CoreConfigSchema, parseCoreConfig } from "@/config/config-schema";
export { ChatCore, ChatCoreOptions } from "@/services/chat-core";
export { ChatState, SYSTEM_SENDER } from "@/state/chat-state";
export {
  DispatchContext,
  DispatchResult,
} from "@/services/command-dispatcher";
export { selectSuggestion, usageOf } from "@/services/command-registry";
export {
  MalformedPayloadError,
  ProtocolKind,
  ProtocolMessage,
  SpoofedSenderError,
  classify,
  decodeProtocolMessage,
  encodeEmergencyAlert,
  encodeRoleUpdate,
  encodeSupplyRequest,
} from "@/services/protocol-codec";

/**
 * Build a chat core from raw configuration (for example parsed JSON).
 * Invalid configuration throws here, before anything is wired.
 */
export function createChatCore(
  config: unknown,
  transport: MeshTransport,
  inference: InferenceService,
  nickname: string,
): ChatCore {
  const parsed: CoreConfig = parseCoreConfig(config);
  return new ChatCore({ config: parsed, transport, inference, nickname });
}
