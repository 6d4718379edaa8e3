/**
 * Column-level row shapes, one per table. Column names match the
 * ClickHouse DDL in storage/clickhouse/schema.ts.
 */

import type { SkippedRecord } from './storage';

export type RowValue = Date | number | string | string[];

export type RowRecord = Record<string, RowValue>;

export type MetricRow = {
  asleep: number;
  avg: number;
  in_bed: number;
  in_bed_source: string;
  max: number;
  metric_name: string;
  metric_type: string;
  metric_unit: string;
  min: number;
  qty: number;
  sleep_source: string;
  timestamp: Date;
};

/** How child rows point at their workout, per schema layout. */
export type WorkoutKey = { workout_id: string } | { workout_name: string; workout_start: Date };

export type WorkoutRow = {
  active_energy_qty: number;
  active_energy_units: string;
  avg_heart_rate_qty: number;
  avg_heart_rate_units: string;
  distance_qty: number;
  distance_units: string;
  duration: number;
  elevation_up_qty: number;
  elevation_up_units: string;
  end: Date;
  humidity_qty: number;
  humidity_units: string;
  id: string;
  intensity_qty: number;
  intensity_units: string;
  location: string;
  max_heart_rate_qty: number;
  max_heart_rate_units: string;
  name: string;
  speed_qty: number;
  speed_units: string;
  start: Date;
  step_cadence_qty: number;
  step_cadence_units: string;
  temperature_qty: number;
  temperature_units: string;
};

export type RouteRow = WorkoutKey & {
  altitude: number;
  course: number;
  course_accuracy: number;
  horizontal_accuracy: number;
  lat: number;
  lon: number;
  speed: number;
  speed_accuracy: number;
  timestamp: Date;
  vertical_accuracy: number;
};

export type HeartRateRow = WorkoutKey & {
  avg: number;
  max: number;
  min: number;
  qty: number;
  source: string;
  timestamp: Date;
  units: string;
};

export type TimeseriesRow = WorkoutKey & {
  qty: number;
  source: string;
  timestamp: Date;
  units: string;
};

export type StateOfMindRow = {
  associations: string[];
  end: Date;
  id: string;
  kind: string;
  labels: string[];
  start: Date;
  valence: number;
  valence_classification: string;
};

export type EcgRow = {
  average_heart_rate: number;
  classification: string;
  end: Date;
  id: string;
  number_of_voltage_measurements: number;
  sampling_frequency: number;
  source: string;
  start: Date;
};

export type EcgVoltageRow = {
  ecg_id: string;
  sample_index: number;
  timestamp: Date;
  units: string;
  voltage: number;
};

export interface MappedRows<T> {
  rows: T[];
  skipped: SkippedRecord[];
}

export interface WorkoutRowSet {
  activeEnergy: TimeseriesRow[];
  heartRateData: HeartRateRow[];
  heartRateRecovery: HeartRateRow[];
  routes: RouteRow[];
  skipped: SkippedRecord[];
  stepCount: TimeseriesRow[];
  walkingRunningDistance: TimeseriesRow[];
  workouts: WorkoutRow[];
}

export interface EcgRowSet {
  ecg: EcgRow[];
  skipped: SkippedRecord[];
  voltages: EcgVoltageRow[];
}
