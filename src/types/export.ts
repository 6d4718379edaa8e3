import type { Ecg } from './ecg';
import type { Metric } from './metric';
import type { StateOfMind } from './stateOfMind';
import type { Workout } from './workout';

/**
 * Decoded payload of one upload request.
 */
export interface Export {
  ecg: Ecg[];
  metrics: Metric[];
  stateOfMind: StateOfMind[];
  workouts: Workout[];
}

/**
 * Counts reported back to the uploader.
 */
export interface ExportSummary {
  ecg: number;
  metrics: number;
  populatedMetrics: number;
  samples: number;
  stateOfMind: number;
  workouts: number;
}

/**
 * Decode-time observations that do not fail the request.
 */
export interface DecodeReport {
  /** Samples carrying fields of more than one value shape. */
  ambiguousSamples: number;
}
