/**
 * Narrow view of the mesh transport. The core only hands text to it; routing,
 * encryption and retries stay on the transport side.
 */
interface MeshTransport {
  readonly myPeerId: string;
  /** Broadcast to the main timeline (scope null) or to a channel. */
  send(text: string, mentions: string[], scope: string | null): void;
  sendPrivate(
    text: string,
    peerId: string,
    recipientNickname: string,
    messageId: string,
  ): void;
  /** peerId -> nickname for every peer the transport currently knows. */
  getPeerNicknames(): Map<string, string>;
}

type ModelCapability = {
  text: boolean;
  vision: boolean;
};

type ModelRef = {
  name: string;
};

/**
 * On-device inference engine. Treated as a streaming text generator.
 */
interface InferenceService {
  listModels(capability: ModelCapability): ModelRef[];
  isDownloaded(model: ModelRef): boolean;
  isInitialized(model: ModelRef): boolean;
  /** `onDone` receives an empty string on success, an error message otherwise. */
  initialize(model: ModelRef, onDone: (error: string) => void): void;
  runInference(
    model: ModelRef,
    prompt: string,
    image: Uint8Array | null,
    onPartial: (text: string, done: boolean) => void,
    onCleanup: () => void,
  ): void;
}

export { InferenceService, MeshTransport, ModelCapability, ModelRef };
