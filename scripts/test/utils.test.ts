import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigError, InputError, describeError } from "../src/utils/errors.js";
import { formatLine, logger, resolveLogLevel, setLogLevel } from "../src/utils/logger.js";
import { dedupe, displayName } from "../src/utils/path.js";

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel("info");
});

describe("logger", () => {
  it("prefixes the level and appends metadata as JSON", () => {
    expect(formatLine("warn", "Slow input", { files: 2 })).toBe('[WARN] Slow input {"files":2}');
    expect(formatLine("info", "Done")).toBe("[INFO] Done");
  });

  it("suppresses messages below the active level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("warn");

    logger.info("hidden");
    logger.error("shown", { code: "X" });

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] shown {"code":"X"}');
  });

  it("falls back to info for unknown levels", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "chatty" })).toBe("info");
    expect(resolveLogLevel({ AUDIO_QUALITY_VERBOSE: "1" })).toBe("debug");
  });
});

describe("describeError", () => {
  it("exposes the code and details of report errors", () => {
    expect(describeError(new ConfigError("bad thresholds", ["lraPoorMax must be below lraLowMax"]))).toEqual({
      code: "CONFIG_INVALID",
      error: "bad thresholds",
      details: ["lraPoorMax must be below lraLowMax"],
    });
    expect(describeError(new InputError("gone", "INPUT_NOT_FOUND"))).toEqual({
      code: "INPUT_NOT_FOUND",
      error: "gone",
    });
  });

  it("wraps other failures", () => {
    expect(describeError(new Error("boom"))).toEqual({ error: "boom" });
    expect(describeError("plain")).toEqual({ error: "plain" });
  });
});

describe("path helpers", () => {
  it("takes the last segment of either separator style", () => {
    expect(displayName("/music/album/track.flac")).toBe("track.flac");
    expect(displayName("C:\\music\\track.wav")).toBe("track.wav");
    expect(displayName("track.mp3")).toBe("track.mp3");
  });

  it("keeps the first occurrence of duplicates", () => {
    expect(dedupe(["b", "a", "b"])).toEqual(["b", "a"]);
  });
});
