/**
 * Creates the observation database (or re-applies the schema to an existing
 * one) without collecting anything.
 */
import { SqliteObservationStore } from "../services/observation-store.js";
import { describeError } from "../utils/pipeline-errors.js";
import { DATABASE_PATH } from "./pipeline-config.js";

try {
  const store = new SqliteObservationStore({ databasePath: DATABASE_PATH });
  console.log(`[init-database] ✓ Schema applied to ${DATABASE_PATH}`);
  console.log(`[init-database] ${store.countObservations()} observation(s) stored`);
  store.close();
} catch (error) {
  console.error(`[init-database] ✗ ${describeError(error)}`);
  process.exitCode = 1;
}
