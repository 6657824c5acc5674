import { z } from "zod";

/**
 * Zod schema for the chat core configuration. Every field has a default, so an
 * empty object is a valid configuration.
 */
export const CoreConfigSchema = z.object({
  /** How long a processed event key is remembered */
  dedupTtlMs: z.number().int().positive().default(60 * 1000),

  /** Cap on remembered keys; the oldest are evicted first */
  dedupMaxEntries: z.number().int().positive().default(1000),

  /**
   * Window in which repeated connect/disconnect notifications for the same
   * peer collapse into one. Kept short so a real reconnect is still reported.
   */
  connectionWindowMs: z.number().int().positive().default(5 * 1000),

  /** Interval of the periodic sweep of expired keys */
  sweepIntervalMs: z.number().int().positive().default(30 * 1000),

  /** Window in which a given inbound message can start at most one AI reply */
  aiDebounceMs: z.number().int().positive().default(5 * 1000),

  /** Whether inbound public messages get an automatic AI reply */
  autoRespond: z.boolean().default(false),

  /** Prefix of every AI-authored message */
  aiMarker: z.string().min(1).default("🤖"),

  /**
   * Messages containing any of these (case-insensitive) never trigger an AI
   * reply. Heuristic guard against the AI answering relayed error output.
   */
  loopKeywords: z
    .array(z.string().min(1))
    .default(() => ["wtf", "timeout", "kidding"]),

  /** Characters of the triggering message quoted in the processing notice */
  statusPreviewLength: z.number().int().positive().default(50),

  /** Word limit the prompt asks the model to respect */
  responseWordLimit: z.number().int().positive().default(300),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

/**
 * Validate a configuration object (e.g. parsed JSON), filling defaults for
 * missing fields. Throws a ZodError describing every invalid field.
 */
export function parseCoreConfig(input: unknown = {}): CoreConfig {
  return CoreConfigSchema.parse(input);
}

export const DEFAULT_CORE_CONFIG: CoreConfig = parseCoreConfig();
