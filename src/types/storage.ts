/**
 * Storage layer type definitions.
 */

export const TABLE_KEYS = [
  'metrics',
  'workouts',
  'state_of_mind',
  'workout_routes',
  'workout_heart_rate_data',
  'workout_heart_rate_recovery',
  'workout_step_count_log',
  'workout_walking_running_distance',
  'workout_active_energy',
  'ecg',
  'ecg_voltage',
] as const;

export type TableKey = (typeof TABLE_KEYS)[number];

export type TableNames = Record<TableKey, string>;

export const DEFAULT_TABLE_NAMES: TableNames = {
  ecg: 'ecg',
  ecg_voltage: 'ecg_voltage',
  metrics: 'metrics',
  state_of_mind: 'state_of_mind',
  workout_active_energy: 'workout_active_energy',
  workout_heart_rate_data: 'workout_heart_rate_data',
  workout_heart_rate_recovery: 'workout_heart_rate_recovery',
  workout_routes: 'workout_routes',
  workout_step_count_log: 'workout_step_count_log',
  workout_walking_running_distance: 'workout_walking_running_distance',
  workouts: 'workouts',
};

/**
 * How workout child rows reference their workout.
 * - uuid: by the workout's `id`
 * - legacy: by `(workout_name, workout_start)`
 */
export type SchemaLayout = 'legacy' | 'uuid';

export type StorageErrorPolicy = 'abort' | 'continue';

export type RecordCategory = 'ecg' | 'metrics' | 'stateOfMind' | 'workouts';

/**
 * A record that was decoded but not written, with the reason.
 */
export interface SkippedRecord {
  category: RecordCategory;
  index: number;
  reason: string;
}

export interface StoreResult {
  category: RecordCategory;
  skipped: SkippedRecord[];
  /** Rows written across all tables touched by the operation. */
  written: number;
}
