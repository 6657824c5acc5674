import { ZodError } from "zod";
import { DEFAULT_CORE_CONFIG, parseCoreConfig } from "../config-schema";

describe("parseCoreConfig", () => {
  it("fills every default from an empty object", () => {
    expect(parseCoreConfig({})).toEqual({
      dedupTtlMs: 60000,
      dedupMaxEntries: 1000,
      connectionWindowMs: 5000,
      sweepIntervalMs: 30000,
      aiDebounceMs: 5000,
      autoRespond: false,
      aiMarker: "🤖",
      loopKeywords: ["wtf", "timeout", "kidding"],
      statusPreviewLength: 50,
      responseWordLimit: 300,
    });
  });

  it("keeps defaults for fields that are not given", () => {
    const config = parseCoreConfig({ autoRespond: true, dedupTtlMs: 2000 });

    expect(config.autoRespond).toBe(true);
    expect(config.dedupTtlMs).toBe(2000);
    expect(config.aiDebounceMs).toBe(DEFAULT_CORE_CONFIG.aiDebounceMs);
  });

  it("rejects invalid values", () => {
    expect(() => parseCoreConfig({ dedupTtlMs: -1 })).toThrow(ZodError);
    expect(() => parseCoreConfig({ aiMarker: "" })).toThrow(ZodError);
    expect(() => parseCoreConfig("not an object")).toThrow(ZodError);
  });

  it("does not share the default keyword list between configs", () => {
    const first = parseCoreConfig();
    first.loopKeywords.push("extra");

    expect(parseCoreConfig().loopKeywords).toEqual([
      "wtf",
      "timeout",
      "kidding",
    ]);
  });
});
