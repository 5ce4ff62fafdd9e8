/**
 * Observation point registered once in the store. `id` is assigned by the
 * store on first registration and stays stable afterwards.
 */
export interface LocationRecord {
  id?: number;
  name: string;
  address: string;
  sourceUrl: string;
}

/**
 * Labeled strings pulled out of the station page, before any conversion.
 * Measurement fields are null when the page has no row for them.
 */
export interface RawObservation {
  locationName: string;
  locationAddress: string;
  observedAt: string;
  capturedAt: string;
  cumulativeRainfall: string | null;
  temperature: string | null;
  windSpeed: string | null;
  roadTemperature: string | null;
  roadCondition: string | null;
  imageUrl: string;
}

export type MeasurementField =
  | "cumulativeRainfall"
  | "temperature"
  | "windSpeed"
  | "roadTemperature";

/**
 * Unit-stripped values, not yet range-checked. Timestamps are still the
 * strings the page carried (`captured_at` already has its year filled in).
 */
export interface NormalizedObservation {
  locationName: string;
  locationAddress: string;
  observedAt: string;
  capturedAt: string;
  cumulativeRainfall: number | null;
  temperature: number | null;
  windSpeed: number | null;
  roadTemperature: number | null;
  roadCondition: string | null;
  imageUrl: string;
}

export interface ValidatedObservation {
  readonly locationId: number;
  /** `YYYY-MM-DD HH:MM`, unique across the store. */
  readonly observedAt: string;
  readonly capturedAt: string;
  /** mm */
  readonly cumulativeRainfall: number | null;
  /** ℃ */
  readonly temperature: number | null;
  /** m/s */
  readonly windSpeed: number | null;
  /** ℃ */
  readonly roadTemperature: number | null;
  readonly roadCondition: string | null;
  readonly imageFilename: string;
  readonly imageUrl: string;
}

export interface StoredObservation extends ValidatedObservation {
  id: number;
  createdAt: string;
}

export type InsertOutcome =
  | { kind: "inserted"; id: number }
  | { kind: "duplicate" }
  | { kind: "failed"; reason: string };

export type ImageDownloadOutcome =
  | { kind: "saved"; path: string; bytes: number }
  | { kind: "exists"; path: string }
  | { kind: "failed"; reason: string }
  | { kind: "skipped" };

export interface PipelineRunResult {
  locationId: number;
  observation: ValidatedObservation;
  insert: Exclude<InsertOutcome, { kind: "failed" }>;
  image: ImageDownloadOutcome;
}
