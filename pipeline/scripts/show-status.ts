/**
 * Prints how many observations are stored and the most recent one.
 */
import type { StoredObservation } from "../../packages/shared/src/contracts.js";
import { SqliteObservationStore } from "../services/observation-store.js";
import { describeError } from "../utils/pipeline-errors.js";
import { DATABASE_PATH, IMAGE_DIRECTORY } from "./pipeline-config.js";

const describeObservation = (observation: StoredObservation): string[] => [
  `  observed:         ${observation.observedAt} (captured ${observation.capturedAt})`,
  `  rainfall:         ${observation.cumulativeRainfall ?? "n/a"} mm`,
  `  temperature:      ${observation.temperature ?? "n/a"} ℃`,
  `  wind speed:       ${observation.windSpeed ?? "n/a"} m/s`,
  `  road temperature: ${observation.roadTemperature ?? "n/a"} ℃`,
  `  road condition:   ${observation.roadCondition ?? "n/a"}`,
  `  image:            ${IMAGE_DIRECTORY}/${observation.imageFilename}`,
  `  stored at:        ${observation.createdAt}`
];

try {
  const store = new SqliteObservationStore({ databasePath: DATABASE_PATH });
  try {
    console.log(`Database: ${DATABASE_PATH}`);
    console.log(`Observations stored: ${store.countObservations()}`);

    const latest = store.latestObservation();
    if (latest) {
      console.log("Latest observation:");
      for (const line of describeObservation(latest)) {
        console.log(line);
      }
    }
  } finally {
    store.close();
  }
} catch (error) {
  console.error(`[show-status] ✗ ${describeError(error)}`);
  process.exitCode = 1;
}
