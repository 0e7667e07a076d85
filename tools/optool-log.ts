import { parseLogLevel, type LogLevel } from "./optool-env";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// DUST_OPACITY_LOG_LEVEL is read on every call.
const enabled = (level: LogLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[parseLogLevel(process.env.DUST_OPACITY_LOG_LEVEL)];

function formatLine(message: string, source: string): string {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  return `${formattedTime} [${source}] ${message}`;
}

export function log(message: string, source = "dust-opacity") {
  if (enabled("info")) console.log(formatLine(message, source));
}

export function logDebug(message: string, source = "dust-opacity") {
  if (enabled("debug")) console.debug(formatLine(message, source));
}

export function logWarn(message: string, source = "dust-opacity") {
  if (enabled("warn")) console.warn(formatLine(`Warning: ${message}`, source));
}

export function logError(message: string, source = "dust-opacity") {
  if (enabled("error")) console.error(formatLine(`Error: ${message}`, source));
}
