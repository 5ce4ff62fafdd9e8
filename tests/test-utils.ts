import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { vi } from "vitest";
import type { PipelineLogger } from "../pipeline/utils/pipeline-logger.js";

export const STATION_PAGE_URL = "http://station.test/sendai/html/DR-74125.html";
export const STATION_IMAGE_URL = "http://station.test/sendai/html/image/DR-74125-l.jpg";

export const readFixture = (name: string): string =>
  readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), "utf8");

export const createTempDirectory = (): { path: string; cleanup: () => void } => {
  const path = mkdtempSync(join(tmpdir(), "station-collector-"));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true })
  };
};

export const createRecordingLogger = () => {
  const logger = {
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>()
  } satisfies PipelineLogger;

  return logger;
};

export const captureError = (operation: () => unknown): unknown => {
  try {
    operation();
  } catch (error) {
    return error;
  }
  throw new Error("Expected operation to throw");
};

export const captureAsyncError = async (operation: () => Promise<unknown>): Promise<unknown> => {
  try {
    await operation();
  } catch (error) {
    return error;
  }
  throw new Error("Expected operation to reject");
};
