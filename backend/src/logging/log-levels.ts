import type { LogLevel } from "@nestjs/common";

export interface ResolvedLogLevels {
  levels: LogLevel[];
  normalized: string;
  fallbackUsed: boolean;
}

/** Nest levels from most to least severe; a threshold enables itself and everything before it. */
const SEVERITY: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

const THRESHOLDS: ReadonlyMap<string, LogLevel> = new Map<string, LogLevel>([
  ["fatal", "fatal"],
  ["error", "error"],
  ["warn", "warn"],
  ["warning", "warn"],
  ["info", "log"],
  ["log", "log"],
  ["debug", "debug"],
  ["verbose", "verbose"],
]);

/** Maps `logging.level` onto the Nest levels to enable. Unknown names fall back to info. */
export function resolveLogLevels(level: unknown): ResolvedLogLevels {
  const requested = typeof level === "string" ? level.trim().toLowerCase() : "info";
  const threshold = THRESHOLDS.get(requested);
  const effective = threshold ?? "log";
  return {
    levels: SEVERITY.slice(0, SEVERITY.indexOf(effective) + 1),
    normalized: effective === "log" ? "info" : effective,
    fallbackUsed: threshold === undefined,
  };
}
