import { z } from "zod";
import type {
  LocationRecord,
  MeasurementField,
  NormalizedObservation,
  ValidatedObservation
} from "../../packages/shared/src/contracts.js";
import { parseMinuteTimestamp, toEpochMinutes } from "../utils/minute-timestamp.js";
import { ValidationError, type ValueRange } from "../utils/pipeline-errors.js";
import type { PipelineLogger } from "../utils/pipeline-logger.js";
import { deriveImageFilename, imageNameFromUrl } from "./image-filename.js";

export const MEASUREMENT_RANGES: Record<MeasurementField, ValueRange> = {
  cumulativeRainfall: { min: 0, max: 1000 },
  temperature: { min: -50, max: 50 },
  windSpeed: { min: 0, max: 100 },
  roadTemperature: { min: -50, max: 80 }
};

/** Captures further than this from the observation are logged, not rejected. */
export const CAPTURE_GAP_WARNING_MINUTES = 30;

export type FieldCheck<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

const ok = <T>(value: T): FieldCheck<T> => ({ ok: true, value });

const fail = <T>(error: ValidationError): FieldCheck<T> => ({ ok: false, error });

const checkWithSchema = <T>(
  field: string,
  schema: z.ZodType<T>,
  value: unknown,
  range?: ValueRange
): FieldCheck<T> => {
  const result = schema.safeParse(value);
  if (result.success) {
    return ok(result.data);
  }

  const reason = result.error.issues[0]?.message ?? "invalid value";
  return fail(new ValidationError(field, reason, range ? { value, range } : { value }));
};

const minuteTimestampSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/, "expected YYYY-MM-DD HH:MM")
  .refine((value) => parseMinuteTimestamp(value) !== null, "not a valid calendar minute");

const locationIdSchema = z.number().int().positive();

const roadConditionSchema = z.string().max(100).nullable();

const imageUrlSchema = z
  .string()
  .regex(/^https?:\/\/.+\.(jpg|jpeg|png)$/, "expected an http(s) URL ending in .jpg, .jpeg or .png");

const imageFilenameSchema = z.string().min(1).max(255);

const measurementSchema = (range: ValueRange) =>
  z.number().min(range.min, "out of range").max(range.max, "out of range").nullable();

export const checkMinuteTimestamp = (field: string, value: string): FieldCheck<string> =>
  checkWithSchema(field, minuteTimestampSchema, value);

export const checkMeasurement = (
  field: MeasurementField,
  value: number | null
): FieldCheck<number | null> => {
  const range = MEASUREMENT_RANGES[field];
  return checkWithSchema(field, measurementSchema(range), value, range);
};

export const checkLocationId = (value: number): FieldCheck<number> =>
  checkWithSchema("locationId", locationIdSchema, value);

export const checkRoadCondition = (value: string | null): FieldCheck<string | null> =>
  checkWithSchema("roadCondition", roadConditionSchema, value);

export const checkImageUrl = (value: string): FieldCheck<string> =>
  checkWithSchema("imageUrl", imageUrlSchema, value);

export const checkImageFilename = (value: string): FieldCheck<string> =>
  checkWithSchema("imageFilename", imageFilenameSchema, value);

/** Signed minutes from observation to capture, or null if either is unparseable. */
export const captureGapMinutes = (observedAt: string, capturedAt: string): number | null => {
  const observed = parseMinuteTimestamp(observedAt);
  const captured = parseMinuteTimestamp(capturedAt);
  if (!observed || !captured) {
    return null;
  }

  return toEpochMinutes(captured) - toEpochMinutes(observed);
};

const unwrap = <T>(check: FieldCheck<T>): T => {
  if (!check.ok) {
    throw check.error;
  }
  return check.value;
};

/**
 * Builds the record that gets persisted. Fields are checked one by one and the
 * first failure is thrown as a {@link ValidationError}; nothing partially
 * checked escapes this function.
 */
export const validateObservation = (
  normalized: NormalizedObservation,
  locationId: number,
  logger: PipelineLogger
): ValidatedObservation => {
  const validLocationId = unwrap(checkLocationId(locationId));
  const observedAt = unwrap(checkMinuteTimestamp("observedAt", normalized.observedAt));
  const capturedAt = unwrap(checkMinuteTimestamp("capturedAt", normalized.capturedAt));
  const cumulativeRainfall = unwrap(
    checkMeasurement("cumulativeRainfall", normalized.cumulativeRainfall)
  );
  const temperature = unwrap(checkMeasurement("temperature", normalized.temperature));
  const windSpeed = unwrap(checkMeasurement("windSpeed", normalized.windSpeed));
  const roadTemperature = unwrap(checkMeasurement("roadTemperature", normalized.roadTemperature));
  const roadCondition = unwrap(checkRoadCondition(normalized.roadCondition));
  const imageUrl = unwrap(checkImageUrl(normalized.imageUrl));
  const imageFilename = unwrap(
    checkImageFilename(deriveImageFilename(observedAt, imageNameFromUrl(imageUrl)))
  );

  const gap = captureGapMinutes(observedAt, capturedAt);
  if (gap !== null && Math.abs(gap) > CAPTURE_GAP_WARNING_MINUTES) {
    logger.warn(
      `Capture time ${capturedAt} is ${Math.abs(gap)} min away from observation ${observedAt} (accepted)`
    );
  }

  return Object.freeze({
    locationId: validLocationId,
    observedAt,
    capturedAt,
    cumulativeRainfall,
    temperature,
    windSpeed,
    roadTemperature,
    roadCondition,
    imageFilename,
    imageUrl
  });
};

const locationSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "must not be blank")
    .max(100),
  address: z
    .string()
    .trim()
    .min(1, "must not be blank")
    .max(200),
  sourceUrl: z.string().regex(/^https?:\/\/.+/, "expected an http(s) URL")
});

export const validateLocationRecord = (location: LocationRecord): LocationRecord => {
  const result = locationSchema.safeParse(location);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join(".") : "location";
    throw new ValidationError(field || "location", issue?.message ?? "invalid location");
  }

  return { ...result.data, ...(location.id !== undefined ? { id: location.id } : {}) };
};
