// src/lib/logger.ts
// Console logger. Debug lines print only with DEBUG_LOGS=true, checked on every call.
type Level = "debug" | "info" | "warn" | "error";

function debugEnabled() {
  return process.env.DEBUG_LOGS === "true";
}

function prefix(level: Level) {
  return `${new Date().toISOString()} ${level.toUpperCase()}`;
}

export function debug(...args: unknown[]) {
  if (debugEnabled()) console.log(prefix("debug"), ...args);
}

export function info(...args: unknown[]) {
  console.log(prefix("info"), ...args);
}

export function warn(...args: unknown[]) {
  console.warn(prefix("warn"), ...args);
}

export function error(...args: unknown[]) {
  console.error(prefix("error"), ...args);
}
