// Environment switches for the Optool runner. CLI flags override these;
// DUST_OPACITY_LOG_LEVEL is read by the logger on every call.
export type LogLevel = "debug" | "info" | "warn" | "error";

export type DustOpacityEnv = {
  optoolBin: string;
  nkDir: string;
  outputDir: string;
  keepStaging: boolean;
};

export const DEFAULT_MATERIAL = "E40R";
export const DEFAULT_GRAIN_SIZE = 0.3;
export const DEFAULT_TEMPERATURES: readonly number[] = Object.freeze([10, 100, 200, 300]);
export const DEFAULT_NK_DIR = "data/nk_files";
export const DEFAULT_OUTPUT_DIR = "radmc3d_model";
export const DEFAULT_OPTOOL_BIN = "optool";

export const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

export function readDustOpacityEnv(env: NodeJS.ProcessEnv = process.env): DustOpacityEnv {
  return Object.freeze({
    optoolBin: nonEmpty(env.OPTOOL_BIN) ?? DEFAULT_OPTOOL_BIN,
    nkDir: nonEmpty(env.DUST_NK_DIR) ?? DEFAULT_NK_DIR,
    outputDir: nonEmpty(env.DUST_OUTPUT_DIR) ?? DEFAULT_OUTPUT_DIR,
    keepStaging: flagEnabled(env.OPTOOL_KEEP_STAGING, false),
  });
}
