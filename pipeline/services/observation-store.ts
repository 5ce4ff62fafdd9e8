import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import type {
  InsertOutcome,
  LocationRecord,
  StoredObservation,
  ValidatedObservation
} from "../../packages/shared/src/contracts.js";
import {
  PersistenceError,
  StoreInitializationError,
  describeError
} from "../utils/pipeline-errors.js";

export const DEFAULT_SCHEMA_PATH = fileURLToPath(
  new URL("../../database/schema.sql", import.meta.url)
);

export interface LocationRegistration {
  id: number;
  created: boolean;
}

/**
 * Storage the collector depends on. `insertObservation` must report a repeat
 * `observedAt` as `duplicate`, enforced by the storage layer itself so that
 * overlapping runs cannot both insert.
 */
export interface ObservationStore {
  ensureLocation(location: LocationRecord): LocationRegistration;
  insertObservation(observation: ValidatedObservation): InsertOutcome;
  findObservation(observedAt: string): StoredObservation | null;
  latestObservation(): StoredObservation | null;
  countObservations(): number;
  close(): void;
}

export interface SqliteObservationStoreOptions {
  databasePath: string;
  schemaPath?: string;
}

interface ObservationRow {
  id: number;
  location_id: number;
  observed_at: string;
  captured_at: string;
  cumulative_rainfall: number | null;
  temperature: number | null;
  wind_speed: number | null;
  road_temperature: number | null;
  road_condition: string | null;
  image_filename: string;
  image_url: string;
  created_at: string;
}

type ObservationInsertParameters = [
  locationId: number,
  observedAt: string,
  capturedAt: string,
  cumulativeRainfall: number | null,
  temperature: number | null,
  windSpeed: number | null,
  roadTemperature: number | null,
  roadCondition: string | null,
  imageFilename: string,
  imageUrl: string
];

const OBSERVATION_COLUMNS = `
  id, location_id, observed_at, captured_at, cumulative_rainfall, temperature,
  wind_speed, road_temperature, road_condition, image_filename, image_url, created_at
`;

const OBSERVED_AT_UNIQUE_MARKER = "observations.observed_at";

const hasSqliteCode = (error: unknown): error is Error & { code: string } =>
  error instanceof Error && "code" in error && typeof error.code === "string";

export const isObservedAtConflict = (error: unknown): boolean =>
  hasSqliteCode(error) &&
  error.code === "SQLITE_CONSTRAINT_UNIQUE" &&
  error.message.includes(OBSERVED_AT_UNIQUE_MARKER);

const toStoredObservation = (row: ObservationRow): StoredObservation => ({
  id: row.id,
  locationId: row.location_id,
  observedAt: row.observed_at,
  capturedAt: row.captured_at,
  cumulativeRainfall: row.cumulative_rainfall,
  temperature: row.temperature,
  windSpeed: row.wind_speed,
  roadTemperature: row.road_temperature,
  roadCondition: row.road_condition,
  imageFilename: row.image_filename,
  imageUrl: row.image_url,
  createdAt: row.created_at
});

/**
 * Opens (creating if needed) the database file and applies the schema. The
 * schema only uses `CREATE TABLE IF NOT EXISTS`, so this also repairs a file
 * that exists but has lost its tables.
 */
const openDatabase = (databasePath: string, schemaPath: string): Database.Database => {
  let db: Database.Database | null = null;

  try {
    mkdirSync(dirname(databasePath), { recursive: true });
    db = new Database(databasePath);
    db.pragma("foreign_keys = ON");
    db.exec(readFileSync(schemaPath, "utf8"));

    const locationsTable = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'locations'"
      )
      .get();

    if (!locationsTable) {
      throw new Error(`Schema ${schemaPath} did not create the locations table`);
    }

    return db;
  } catch (error) {
    db?.close();
    throw new StoreInitializationError(databasePath, error);
  }
};

export class SqliteObservationStore implements ObservationStore {
  private readonly db: Database.Database;

  constructor(options: SqliteObservationStoreOptions) {
    this.db = openDatabase(options.databasePath, options.schemaPath ?? DEFAULT_SCHEMA_PATH);
  }

  ensureLocation(location: LocationRecord): LocationRegistration {
    try {
      const inserted = this.db
        .prepare<[string, string, string]>(
          `
            INSERT INTO locations (location_name, location_address, source_url)
            VALUES (?, ?, ?)
            ON CONFLICT(location_name) DO NOTHING
          `
        )
        .run(location.name, location.address, location.sourceUrl);

      const row = this.db
        .prepare<[string], { id: number }>("SELECT id FROM locations WHERE location_name = ?")
        .get(location.name);

      if (!row) {
        throw new Error(`Location "${location.name}" missing after registration`);
      }

      return { id: row.id, created: inserted.changes === 1 };
    } catch (error) {
      throw new PersistenceError("ensureLocation", error);
    }
  }

  insertObservation(observation: ValidatedObservation): InsertOutcome {
    try {
      const result = this.db
        .prepare<ObservationInsertParameters>(
          `
            INSERT INTO observations (
              location_id, observed_at, captured_at,
              cumulative_rainfall, temperature, wind_speed,
              road_temperature, road_condition,
              image_filename, image_url
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          `
        )
        .run(
          observation.locationId,
          observation.observedAt,
          observation.capturedAt,
          observation.cumulativeRainfall,
          observation.temperature,
          observation.windSpeed,
          observation.roadTemperature,
          observation.roadCondition,
          observation.imageFilename,
          observation.imageUrl
        );

      return { kind: "inserted", id: Number(result.lastInsertRowid) };
    } catch (error) {
      if (isObservedAtConflict(error)) {
        return { kind: "duplicate" };
      }

      return { kind: "failed", reason: describeError(error) };
    }
  }

  findObservation(observedAt: string): StoredObservation | null {
    const row = this.db
      .prepare<[string], ObservationRow>(
        `SELECT ${OBSERVATION_COLUMNS} FROM observations WHERE observed_at = ?`
      )
      .get(observedAt);

    return row ? toStoredObservation(row) : null;
  }

  latestObservation(): StoredObservation | null {
    const row = this.db
      .prepare<[], ObservationRow>(
        `SELECT ${OBSERVATION_COLUMNS} FROM observations ORDER BY observed_at DESC LIMIT 1`
      )
      .get();

    return row ? toStoredObservation(row) : null;
  }

  countObservations(): number {
    const row = this.db
      .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM observations")
      .get();

    return row?.total ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
