/**
 * Centralized type exports.
 */

export type { Ecg, VoltagePoint } from './ecg';
export type { DecodeReport, Export, ExportSummary } from './export';
export type {
  Metric,
  QuantitySample,
  RangeSample,
  Sample,
  SampleKind,
  SleepSample,
} from './metric';
export type { StateOfMind } from './stateOfMind';
export { DEFAULT_TABLE_NAMES, TABLE_KEYS } from './storage';
export type {
  RecordCategory,
  SchemaLayout,
  SkippedRecord,
  StorageErrorPolicy,
  StoreResult,
  TableKey,
  TableNames,
} from './storage';
export type { GpsPoint, HeartRateLog, Quantity, TimeseriesLog, Workout } from './workout';
export type {
  EcgRow,
  EcgRowSet,
  EcgVoltageRow,
  HeartRateRow,
  MappedRows,
  MetricRow,
  RouteRow,
  RowRecord,
  RowValue,
  StateOfMindRow,
  TimeseriesRow,
  WorkoutKey,
  WorkoutRow,
  WorkoutRowSet,
} from './rows';
