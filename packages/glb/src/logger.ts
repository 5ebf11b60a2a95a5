import { format } from "node:util";

export const LogLevel = {
  Debug: 0,
  Info: 1,
  Error: 2,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logging sink shared by every export step. `format` takes printf-style
 * placeholders (`%s`, `%d`, `%j`).
 */
export type Logger = (level: number, format: string, ...args: unknown[]) => void;

const LEVEL_LABELS: Record<LogLevel, string> = {
  0: "debug",
  1: "info",
  2: "error",
};

function labelFor(level: number): string {
  if (level <= LogLevel.Debug) return LEVEL_LABELS[LogLevel.Debug];
  if (level >= LogLevel.Error) return LEVEL_LABELS[LogLevel.Error];
  return LEVEL_LABELS[LogLevel.Info];
}

export function formatLogLine(level: number, message: string, ...args: unknown[]): string {
  return `${labelFor(level)}: ${format(message, ...args)}`;
}

export function createLogger(writeLine: (line: string) => void, minLevel: number = LogLevel.Debug): Logger {
  return (level, message, ...args) => {
    if (level < minLevel) return;
    writeLine(formatLogLine(level, message, ...args));
  };
}
