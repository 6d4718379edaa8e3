/**
 * Data mapper exports.
 * Decoding of upload bodies and flattening of decoded records into table rows.
 */

export { toEcgRows, voltageTimestamp } from './ecgMapper';
export {
  assertNever,
  classifySample,
  decodeExport,
  formatSummary,
  formatZodError,
  summarizeExport,
} from './exportMapper';
export type { ClassifiedSample, DecodedExport } from './exportMapper';
export { DEFAULT_METRIC_TYPE, lookupMetricType, toMetricRows } from './metricMapper';
export { toStateOfMindRows } from './stateOfMindMapper';
export { toWorkoutRows } from './workoutMapper';
