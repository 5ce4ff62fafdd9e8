import { foldFullWidth } from "../../packages/shared/src/text-utils.js";
import type {
  NormalizedObservation,
  RawObservation
} from "../../packages/shared/src/contracts.js";

/** Road-condition text the station prints when it has no reading. */
export const ROAD_CONDITION_NO_DATA = "----";

const SIGNED_DECIMAL_PATTERN = /-?\d+(?:\.\d+)?|-?\.\d+/;

/**
 * `"4.7℃"` → 4.7, `"1.8m/s"` → 1.8, `"-2.5"` → -2.5. Numbers pass through;
 * empty, missing or number-free text yields null instead of failing, since
 * unit noise on the page is routine.
 */
export const normalizeMeasurement = (
  value: number | string | null | undefined
): number | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  const match = SIGNED_DECIMAL_PATTERN.exec(foldFullWidth(value));
  if (!match) {
    return null;
  }

  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : null;
};

export const normalizeRoadCondition = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed || trimmed === ROAD_CONDITION_NO_DATA) {
    return null;
  }

  return trimmed;
};

export const normalizeRawObservation = (raw: RawObservation): NormalizedObservation => ({
  locationName: raw.locationName.trim(),
  locationAddress: raw.locationAddress.trim(),
  observedAt: raw.observedAt.trim(),
  capturedAt: raw.capturedAt.trim(),
  cumulativeRainfall: normalizeMeasurement(raw.cumulativeRainfall),
  temperature: normalizeMeasurement(raw.temperature),
  windSpeed: normalizeMeasurement(raw.windSpeed),
  roadTemperature: normalizeMeasurement(raw.roadTemperature),
  roadCondition: normalizeRoadCondition(raw.roadCondition),
  imageUrl: raw.imageUrl.trim()
});
