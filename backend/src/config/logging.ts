import type { LogLevel } from "@nestjs/common";

export interface ResolvedLogLevels {
  levels: LogLevel[];
  normalized: string;
  fallbackUsed: boolean;
}

/** Most to least severe; a threshold enables itself and everything before it. */
const SEVERITY_ORDER: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

const LEVEL_NAMES = new Map<string, LogLevel>([
  ...SEVERITY_ORDER.map((level): [string, LogLevel] => [level, level]),
  ["info", "log"],
  ["warning", "warn"],
]);

const displayName = (level: LogLevel): string => (level === "log" ? "info" : level);

const enabledUpTo = (threshold: LogLevel): LogLevel[] =>
  SEVERITY_ORDER.slice(0, SEVERITY_ORDER.indexOf(threshold) + 1);

export const DEFAULT_LOG_LEVELS: LogLevel[] = enabledUpTo("log");

export function resolveLogLevels(level: unknown): ResolvedLogLevels {
  const requested = typeof level === "string" ? level.trim().toLowerCase() : "info";
  const threshold = LEVEL_NAMES.get(requested);
  if (!threshold) {
    return {levels: [...DEFAULT_LOG_LEVELS], normalized: "info", fallbackUsed: true};
  }
  return {levels: enabledUpTo(threshold), normalized: displayName(threshold), fallbackUsed: false};
}
