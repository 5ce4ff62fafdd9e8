/**
 * Collects one observation from the station page.
 *
 * Meant to be invoked by an external scheduler (cron, every 15 minutes).
 * Exits 0 when the observation was stored or was already stored, and 1 on
 * any fetch, extraction, validation or storage failure.
 */
import { ImageDownloader } from "../services/image-downloader.js";
import { runCollection } from "../services/observation-collection.js";
import { SqliteObservationStore } from "../services/observation-store.js";
import { fetchStationPage } from "../services/station-page-fetcher.js";
import { createConsoleLogger, createFileTeeLogger } from "../utils/pipeline-logger.js";
import {
  DATABASE_PATH,
  FETCH_TIMEOUT_MS,
  IMAGE_DIRECTORY,
  LOG_FILE_PATH,
  SCRAPE_DEBUG_ARTIFACT_DIRECTORY,
  STATION_ADDRESS,
  STATION_IMAGE_PATTERN,
  STATION_NAME,
  STATION_PAGE_URL
} from "./pipeline-config.js";

const consoleLogger = createConsoleLogger("collect-observation");
const logger = LOG_FILE_PATH ? createFileTeeLogger(LOG_FILE_PATH, consoleLogger) : consoleLogger;

process.exitCode = await runCollection({
  location: {
    name: STATION_NAME,
    address: STATION_ADDRESS,
    sourceUrl: STATION_PAGE_URL
  },
  openStore: () => new SqliteObservationStore({ databasePath: DATABASE_PATH }),
  fetchPage: (url) => fetchStationPage(url, { timeoutMs: FETCH_TIMEOUT_MS }),
  imageDownloader: new ImageDownloader({
    imageDirectory: IMAGE_DIRECTORY,
    timeoutMs: FETCH_TIMEOUT_MS
  }),
  logger,
  imagePattern: STATION_IMAGE_PATTERN,
  debugArtifactDirectory: SCRAPE_DEBUG_ARTIFACT_DIRECTORY
});
