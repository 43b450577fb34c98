import { afterEach, describe, it, expect, vi } from "vitest";
import { Effect, LogLevel } from "effect";
import { loggerLayer, parseLogLevel } from "@bytepair/effect-runtime";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseLogLevel", () => {
  it("accepts names in any case", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.Debug);
    expect(parseLogLevel("warn")).toBe(LogLevel.Warning);
    expect(parseLogLevel("warning")).toBe(LogLevel.Warning);
    expect(parseLogLevel("off")).toBe(LogLevel.None);
  });

  it("defaults to info", () => {
    expect(parseLogLevel("chatty")).toBe(LogLevel.Info);
  });
});

describe("loggerLayer", () => {
  it("writes one line to stderr with annotations", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    Effect.runSync(
      Effect.logWarning("disk low").pipe(
        Effect.annotateLogs({ dir: "tok" }),
        Effect.provide(loggerLayer(LogLevel.Info)),
      ),
    );
    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] WARN  disk low \[dir=tok\]$/);
  });

  it("drops messages below the minimum level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    Effect.runSync(Effect.logDebug("hidden").pipe(Effect.provide(loggerLayer(LogLevel.Info))));
    expect(spy).not.toHaveBeenCalled();
  });
});
