import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export interface PipelineLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

type LogLevel = keyof PipelineLogger;

export const createConsoleLogger = (prefix: string): PipelineLogger => ({
  info: (message) => console.log(`[${prefix}] ${message}`),
  warn: (message) => console.warn(`[${prefix}] ⚠ ${message}`),
  error: (message) => console.error(`[${prefix}] ✗ ${message}`)
});

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatLogTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Forwards every line to `inner` and appends it to `filePath` as
 * `[YYYY-MM-DD HH:MM:SS] LEVEL: message`. The first failed write is reported
 * on stderr and the file is not touched again for the rest of the run.
 */
export const createFileTeeLogger = (
  filePath: string,
  inner: PipelineLogger,
  now: () => Date = () => new Date()
): PipelineLogger => {
  let fileDisabled = false;

  const append = (level: LogLevel, message: string) => {
    if (fileDisabled) {
      return;
    }

    try {
      mkdirSync(dirname(filePath), { recursive: true });
      appendFileSync(
        filePath,
        `[${formatLogTimestamp(now())}] ${level.toUpperCase()}: ${message}\n`,
        "utf8"
      );
    } catch (error) {
      fileDisabled = true;
      console.error(
        `Log file ${filePath} is not writable, continuing without it:`,
        error instanceof Error ? error.message : error
      );
    }
  };

  return {
    info: (message) => {
      inner.info(message);
      append("info", message);
    },
    warn: (message) => {
      inner.warn(message);
      append("warn", message);
    },
    error: (message) => {
      inner.error(message);
      append("error", message);
    }
  };
};
