import { Message } from "@/types/global";
import {
  InferenceService,
  MeshTransport,
  ModelCapability,
  ModelRef,
} from "@/types/interface";

/** In-process transport that records what the core hands it. */
export class FakeTransport implements MeshTransport {
  readonly myPeerId: string;
  readonly nicknames = new Map<string, string>();

  send = jest.fn<void, [string, string[], string | null]>();
  sendPrivate = jest.fn<void, [string, string, string, string]>();

  constructor(myPeerId: string = "ME") {
    this.myPeerId = myPeerId;
  }

  getPeerNicknames(): Map<string, string> {
    return new Map(this.nicknames);
  }

  /** [text, scope] of every broadcast so far */
  broadcasts(): [string, string | null][] {
    return this.send.mock.calls.map(
      ([text, , scope]): [string, string | null] => [text, scope],
    );
  }
}

type InferenceRun = {
  model: ModelRef;
  prompt: string;
  onPartial: (text: string, done: boolean) => void;
  onCleanup: () => void;
};

/**
 * Inference engine driven by the test: initialization and streaming only
 * progress when the test calls `finishInitialization` or `emit`.
 */
export class FakeInference implements InferenceService {
  readonly models: ModelRef[] = [];
  readonly downloaded = new Set<string>();
  readonly initialized = new Set<string>();
  readonly runs: InferenceRun[] = [];

  private pendingInit: ((error: string) => void) | null = null;

  /** Register a model, optionally downloaded and initialized. */
  withModel(
    name: string,
    options: { downloaded?: boolean; initialized?: boolean } = {},
  ): this {
    this.models.push({ name });
    if (options.downloaded ?? true) this.downloaded.add(name);
    if (options.initialized ?? true) this.initialized.add(name);
    return this;
  }

  listModels = jest.fn((capability: ModelCapability): ModelRef[] =>
    capability.text ? [...this.models] : [],
  );

  isDownloaded(model: ModelRef): boolean {
    return this.downloaded.has(model.name);
  }

  isInitialized(model: ModelRef): boolean {
    return this.initialized.has(model.name);
  }

  initialize = jest.fn((model: ModelRef, onDone: (error: string) => void) => {
    this.pendingInit = (error) => {
      if (error.length === 0) this.initialized.add(model.name);
      onDone(error);
    };
  });

  runInference = jest.fn(
    (
      model: ModelRef,
      prompt: string,
      _image: Uint8Array | null,
      onPartial: (text: string, done: boolean) => void,
      onCleanup: () => void,
    ) => {
      this.runs.push({ model, prompt, onPartial, onCleanup });
    },
  );

  finishInitialization(error: string = ""): void {
    const done = this.pendingInit;
    if (!done) throw new Error("No initialization in progress");
    this.pendingInit = null;
    done(error);
  }

  /** Deliver a partial (or final) result to the latest inference run. */
  emit(text: string, done: boolean = false): void {
    const run = this.runs[this.runs.length - 1];
    if (!run) throw new Error("No inference in progress");
    run.onPartial(text, done);
    if (done) run.onCleanup();
  }
}

let nextId = 0;

/** Inbound message with sensible defaults. */
export function makeMessage(overrides: Partial<Message> = {}): Message {
  nextId += 1;
  return {
    id: `m${nextId}`,
    sender: "alice",
    senderPeerId: "P1",
    content: "hello",
    timestamp: 1700000000000 + nextId,
    channel: null,
    isPrivate: false,
    recipientNickname: null,
    deliveryStatus: null,
    ...overrides,
  };
}
