import "dotenv/config";
import { DEFAULT_STATION_IMAGE_PATTERN } from "../services/station-page-parser.js";

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

const readString = (name: string, fallback: string): string => {
  const value = process.env[name];
  return value !== undefined && value.trim().length > 0 ? value.trim() : fallback;
};

const readPositiveInteger = (name: string, fallback: number): number => {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readPattern = (name: string, fallback: RegExp): RegExp => {
  const source = process.env[name];
  if (!source) {
    return fallback;
  }

  try {
    return new RegExp(source);
  } catch {
    console.warn(`⚠ ${name} is not a valid regular expression, using ${fallback}`);
    return fallback;
  }
};

export const STATION_PAGE_URL = readString(
  "STATION_PAGE_URL",
  "http://www2.thr.mlit.go.jp/sendai/html/DR-74125.html"
);
export const STATION_NAME = readString("STATION_NAME", "作並宿（チェーン着脱所）");
export const STATION_ADDRESS = readString("STATION_ADDRESS", "宮城県仙台市青葉区作並");
export const STATION_IMAGE_PATTERN = readPattern(
  "STATION_IMAGE_PATTERN",
  DEFAULT_STATION_IMAGE_PATTERN
);

export const DATABASE_PATH = readString("DATABASE_PATH", "outputs/database/delta_station.db");
export const IMAGE_DIRECTORY = readString("IMAGE_DIRECTORY", "outputs/images");

/** An explicitly empty LOG_FILE_PATH turns the log file off. */
export const LOG_FILE_PATH =
  process.env.LOG_FILE_PATH === undefined
    ? "outputs/collector.log"
    : process.env.LOG_FILE_PATH.trim() || null;

export const FETCH_TIMEOUT_MS = readPositiveInteger("FETCH_TIMEOUT_MS", 30_000);

export const SCRAPE_DEBUG_ARTIFACT_DIRECTORY =
  process.env.SCRAPE_DEBUG_ARTIFACT_DIR ?? null;
