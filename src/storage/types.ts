import type { Ecg, Metric, RowRecord, StateOfMind, StoreResult, Workout } from '../types';

/**
 * Persistence target for decoded exports. Every write accepts an optional
 * signal; an aborted signal cancels in-flight statements.
 */
export interface MetricStore {
  /** Verify connectivity and, when configured, create the database and tables. */
  init(signal?: AbortSignal): Promise<void>;
  storeMetrics(metrics: Metric[], signal?: AbortSignal): Promise<StoreResult>;
  storeWorkouts(workouts: Workout[], signal?: AbortSignal): Promise<StoreResult>;
  storeStateOfMind(entries: StateOfMind[], signal?: AbortSignal): Promise<StoreResult>;
  storeEcg(entries: Ecg[], signal?: AbortSignal): Promise<StoreResult>;
  /** Force replacing merges so each primary key holds a single row. */
  optimizeTables(signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

/**
 * The slice of a ClickHouse client the store needs. Values travel as
 * JSONEachRow bodies and are never spliced into SQL text.
 */
export interface ColumnStoreClient {
  /** Run a statement that returns no rows (DDL, OPTIMIZE). */
  command(query: string, signal?: AbortSignal): Promise<void>;
  insert(table: string, rows: RowRecord[], signal?: AbortSignal): Promise<void>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
