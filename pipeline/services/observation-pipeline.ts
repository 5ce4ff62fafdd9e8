import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  ImageDownloadOutcome,
  LocationRecord,
  PipelineRunResult,
  RawObservation
} from "../../packages/shared/src/contracts.js";
import { ExtractionError, PersistenceError, describeError } from "../utils/pipeline-errors.js";
import type { PipelineLogger } from "../utils/pipeline-logger.js";
import type { ImageDownloader } from "./image-downloader.js";
import { normalizeRawObservation } from "./observation-normalizer.js";
import type { ObservationStore } from "./observation-store.js";
import { validateLocationRecord, validateObservation } from "./observation-validator.js";
import { parseStationPage } from "./station-page-parser.js";

export interface ObservationPipelineDependencies {
  location: LocationRecord;
  store: ObservationStore;
  fetchPage: (url: string) => Promise<{ html: string; finalUrl: string }>;
  imageDownloader: Pick<ImageDownloader, "download">;
  logger: PipelineLogger;
  imagePattern?: RegExp;
  /** When set, the page HTML is written here if extraction fails. */
  debugArtifactDirectory?: string | null;
  now?: () => Date;
}

const formatMeasurement = (value: number | null, unit: string): string =>
  value === null ? "n/a" : `${value}${unit}`;

const writeDebugArtifact = async (
  directory: string,
  html: string,
  now: Date,
  logger: PipelineLogger
): Promise<void> => {
  const artifactPath = join(
    directory,
    `${now.toISOString().replace(/[:.]/g, "-")}-station-page.html`
  );

  try {
    await mkdir(directory, { recursive: true });
    await writeFile(artifactPath, html, "utf8");
    logger.info(`Saved unparseable page to ${artifactPath}`);
  } catch (error) {
    logger.warn(`Could not save debug artifact ${artifactPath}: ${describeError(error)}`);
  }
};

/**
 * One collection run: register the location, fetch and parse the page,
 * normalize and validate, insert once per `observedAt`, and fetch the photo
 * only for a new row. Fatal problems throw a `PipelineError`; a duplicate is
 * a normal result and a failed photo download only downgrades `image`.
 */
export const runObservationPipeline = async (
  dependencies: ObservationPipelineDependencies
): Promise<PipelineRunResult> => {
  const { store, logger } = dependencies;
  const now = dependencies.now ?? (() => new Date());

  const location = validateLocationRecord(dependencies.location);
  const registration = store.ensureLocation(location);
  if (registration.created) {
    logger.info(`Registered new location: ${location.name} (id ${registration.id})`);
  }

  const page = await dependencies.fetchPage(location.sourceUrl);

  let raw: RawObservation;
  try {
    raw = parseStationPage(page.html, page.finalUrl, {
      imagePattern: dependencies.imagePattern,
      now
    });
  } catch (error) {
    if (error instanceof ExtractionError && dependencies.debugArtifactDirectory) {
      await writeDebugArtifact(dependencies.debugArtifactDirectory, page.html, now(), logger);
    }
    throw error;
  }

  logger.info(`Page location: ${raw.locationName} (${raw.locationAddress})`);
  if (raw.locationName !== location.name) {
    logger.warn(
      `Page reports location "${raw.locationName}", registered as "${location.name}"`
    );
  }

  const observation = validateObservation(
    normalizeRawObservation(raw),
    registration.id,
    logger
  );

  logger.info(`Observed at: ${observation.observedAt} (captured ${observation.capturedAt})`);
  logger.info(
    `Temperature ${formatMeasurement(observation.temperature, "℃")}, ` +
      `road ${formatMeasurement(observation.roadTemperature, "℃")}, ` +
      `wind ${formatMeasurement(observation.windSpeed, "m/s")}, ` +
      `rainfall ${formatMeasurement(observation.cumulativeRainfall, "mm")}, ` +
      `road condition ${observation.roadCondition ?? "n/a"}`
  );

  const insert = store.insertObservation(observation);

  if (insert.kind === "failed") {
    throw new PersistenceError("insertObservation", new Error(insert.reason));
  }

  if (insert.kind === "duplicate") {
    logger.info(`Already stored, nothing to do: ${observation.observedAt}`);
    return { locationId: registration.id, observation, insert, image: { kind: "skipped" } };
  }

  logger.info(`Inserted observation ${observation.observedAt} (row ${insert.id})`);

  let image: ImageDownloadOutcome;
  try {
    image = await dependencies.imageDownloader.download(
      observation.imageUrl,
      observation.imageFilename
    );
    logger.info(
      image.kind === "saved"
        ? `Saved image ${observation.imageFilename} (${image.bytes} bytes)`
        : `Image already present: ${observation.imageFilename}`
    );
  } catch (error) {
    image = { kind: "failed", reason: describeError(error) };
    logger.warn(
      `Image download failed, observation kept without photo: ${image.reason}`
    );
  }

  return { locationId: registration.id, observation, insert, image };
};
