/**
 * Metric type definitions.
 * A metric is a named series of samples from Apple Health.
 */

interface SampleCommon {
  /** Absent when the exporter omitted it; stamped with processing time on write. */
  date?: Date;
}

export interface QuantitySample extends SampleCommon {
  kind: 'quantity';
  qty: number;
}

export interface RangeSample extends SampleCommon {
  kind: 'range';
  avg: number;
  max: number;
  min: number;
}

export interface SleepSample extends SampleCommon {
  kind: 'sleep';
  asleep: number;
  inBed: number;
  inBedSource: string;
  sleepSource: string;
}

export type Sample = QuantitySample | RangeSample | SleepSample;

export type SampleKind = Sample['kind'];

export interface Metric {
  name: string;
  samples: Sample[];
  units: string;
}
