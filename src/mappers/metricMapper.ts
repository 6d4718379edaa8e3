/**
 * Metric transformation utilities.
 * Flattens metrics into one row per sample for the metrics table.
 */

import metricTypes from './metricTypes.json';
import { assertNever } from './exportMapper';

import type { Metric, MetricRow, Sample } from '../types';

export const DEFAULT_METRIC_TYPE = 'other';

// Metric name -> category, e.g. heart_rate -> heart
const METRIC_TYPES: ReadonlyMap<string, string> = new Map(Object.entries(metricTypes));

export function lookupMetricType(name: string): string {
  return METRIC_TYPES.get(name) ?? DEFAULT_METRIC_TYPE;
}

const EMPTY_VALUES = {
  asleep: 0,
  avg: 0,
  in_bed: 0,
  in_bed_source: '',
  max: 0,
  min: 0,
  qty: 0,
  sleep_source: '',
};

type SampleValues = typeof EMPTY_VALUES;

function sampleValues(sample: Sample): SampleValues {
  switch (sample.kind) {
    case 'quantity': {
      return { ...EMPTY_VALUES, qty: sample.qty };
    }
    case 'range': {
      return { ...EMPTY_VALUES, avg: sample.avg, max: sample.max, min: sample.min };
    }
    case 'sleep': {
      return {
        ...EMPTY_VALUES,
        asleep: sample.asleep,
        in_bed: sample.inBed,
        in_bed_source: sample.inBedSource,
        sleep_source: sample.sleepSource,
      };
    }
    default: {
      return assertNever(sample);
    }
  }
}

/**
 * One row per (metric, sample). Samples without a date are stamped with
 * `now()`, evaluated once per call so a batch shares one timestamp.
 */
export function toMetricRows(metrics: Metric[], now: () => Date = () => new Date()): MetricRow[] {
  const processedAt = now();
  const rows: MetricRow[] = [];

  for (const metric of metrics) {
    const metricType = lookupMetricType(metric.name);
    for (const sample of metric.samples) {
      rows.push({
        ...sampleValues(sample),
        metric_name: metric.name,
        metric_type: metricType,
        metric_unit: metric.units,
        timestamp: sample.date ?? processedAt,
      });
    }
  }

  return rows;
}
