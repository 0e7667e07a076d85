import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { flagEnabled, parseLogLevel, readDustOpacityEnv } from "../tools/optool-env";
import { log, logDebug, logError, logWarn } from "../tools/optool-log";

describe("readDustOpacityEnv", () => {
  it("falls back to defaults", () => {
    expect(readDustOpacityEnv({})).toEqual({
      optoolBin: "optool",
      nkDir: "data/nk_files",
      outputDir: "radmc3d_model",
      keepStaging: false,
    });
  });

  it("reads overrides and ignores blank values", () => {
    const env = readDustOpacityEnv({
      OPTOOL_BIN: "/opt/optool/optool",
      DUST_NK_DIR: "nk_optool",
      DUST_OUTPUT_DIR: "  ",
      OPTOOL_KEEP_STAGING: "yes",
    });
    expect(env).toEqual({
      optoolBin: "/opt/optool/optool",
      nkDir: "nk_optool",
      outputDir: "radmc3d_model",
      keepStaging: true,
    });
    expect(Object.isFrozen(env)).toBe(true);
  });
});

describe("flagEnabled", () => {
  it("parses common boolean spellings", () => {
    expect(flagEnabled("1", false)).toBe(true);
    expect(flagEnabled(" ON ", false)).toBe(true);
    expect(flagEnabled("off", true)).toBe(false);
    expect(flagEnabled("maybe", true)).toBe(true);
    expect(flagEnabled(undefined, false)).toBe(false);
  });
});

describe("logging", () => {
  const original = process.env.DUST_OPACITY_LOG_LEVEL;

  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (original === undefined) {
      delete process.env.DUST_OPACITY_LOG_LEVEL;
    } else {
      process.env.DUST_OPACITY_LOG_LEVEL = original;
    }
  });

  it("tags lines with their source", () => {
    process.env.DUST_OPACITY_LOG_LEVEL = "info";
    log("Generated: dustkappa_E40R_a0.3.inp", "opacity-runner");
    logWarn("Using E40R.lnk which may not match 10K exactly.", "nk-resolver");
    logError("Directory nk not found.");

    expect(String(vi.mocked(console.log).mock.calls[0][0])).toMatch(
      / \[opacity-runner\] Generated: dustkappa_E40R_a0\.3\.inp$/,
    );
    expect(String(vi.mocked(console.warn).mock.calls[0][0])).toMatch(
      / \[nk-resolver\] Warning: Using E40R\.lnk which may not match 10K exactly\.$/,
    );
    expect(String(vi.mocked(console.error).mock.calls[0][0])).toMatch(/ \[dust-opacity\] Error: Directory nk not found\.$/);
  });

  it("filters below the configured level", () => {
    process.env.DUST_OPACITY_LOG_LEVEL = "warn";
    logDebug("hidden");
    log("hidden");
    logWarn("shown");
    expect(vi.mocked(console.debug)).not.toHaveBeenCalled();
    expect(vi.mocked(console.log)).not.toHaveBeenCalled();
    expect(vi.mocked(console.warn)).toHaveBeenCalledTimes(1);
  });

  it("treats unknown levels as info", () => {
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
