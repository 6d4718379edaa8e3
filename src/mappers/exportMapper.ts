/**
 * Decoding of upload bodies into typed exports.
 *
 * zod handles shape and defaults (see validation/schemas.ts); this module
 * turns the validated payload into the domain types and classifies samples.
 */

import { DecodeError, errorMessage } from '../utils/errors';
import { ExportPayloadSchema } from '../validation/schemas';

import type { ZodError } from 'zod';
import type {
  DecodeReport,
  Ecg,
  Export,
  ExportSummary,
  Metric,
  Sample,
  SampleKind,
  StateOfMind,
  Workout,
} from '../types';
import type { ExportPayload, RawEcg, RawMetric, RawSample, RawWorkout } from '../validation/schemas';

// Zod reports every failing element; a handful is enough to diagnose a payload
const MAX_REPORTED_ISSUES = 5;

export interface DecodedExport {
  export: Export;
  report: DecodeReport;
}

export interface ClassifiedSample {
  /** True when fields of more than one shape were present. */
  ambiguous: boolean;
  sample: Sample;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

/**
 * Pick the sample shape by field presence, sleep first, then range,
 * then quantity. Missing value fields default to 0 and sources to ''.
 */
export function classifySample(raw: RawSample): ClassifiedSample {
  const hasSleep =
    raw.asleep !== undefined ||
    raw.inBed !== undefined ||
    raw.sleepSource !== undefined ||
    raw.inBedSource !== undefined;
  const hasRange = raw.min !== undefined || raw.max !== undefined || raw.avg !== undefined;
  const hasQuantity = raw.qty !== undefined;

  const shapes = [hasSleep, hasRange, hasQuantity].filter(Boolean).length;
  const kind: SampleKind = hasSleep ? 'sleep' : hasRange ? 'range' : 'quantity';

  return { ambiguous: shapes > 1, sample: buildSample(kind, raw) };
}

function buildSample(kind: SampleKind, raw: RawSample): Sample {
  switch (kind) {
    case 'quantity': {
      return { date: raw.date, kind, qty: raw.qty ?? 0 };
    }
    case 'range': {
      return { avg: raw.avg ?? 0, date: raw.date, kind, max: raw.max ?? 0, min: raw.min ?? 0 };
    }
    case 'sleep': {
      return {
        asleep: raw.asleep ?? 0,
        date: raw.date,
        inBed: raw.inBed ?? 0,
        inBedSource: raw.inBedSource ?? '',
        kind,
        sleepSource: raw.sleepSource ?? '',
      };
    }
    default: {
      return assertNever(kind);
    }
  }
}

function mapMetric(raw: RawMetric, report: DecodeReport): Metric {
  const samples = raw.data.map((entry) => {
    const { ambiguous, sample } = classifySample(entry);
    if (ambiguous) report.ambiguousSamples++;
    return sample;
  });
  return { name: raw.name, samples, units: raw.units };
}

function mapWorkout(raw: RawWorkout): Workout {
  const { heartRate, ...workout } = raw;
  return {
    ...workout,
    avgHeartRate: raw.avgHeartRate ?? heartRate?.avg,
    maxHeartRate: raw.maxHeartRate ?? heartRate?.max,
  };
}

function mapEcg(raw: RawEcg): Ecg {
  return {
    ...raw,
    numberOfVoltageMeasurements: raw.numberOfVoltageMeasurements ?? raw.voltageMeasurements.length,
  };
}

function mapPayload(payload: ExportPayload): DecodedExport {
  const report: DecodeReport = { ambiguousSamples: 0 };
  const stateOfMind: StateOfMind[] = payload.data.stateOfMind;

  return {
    export: {
      ecg: payload.data.ecg.map(mapEcg),
      metrics: payload.data.metrics.map((metric) => mapMetric(metric, report)),
      stateOfMind,
      workouts: payload.data.workouts.map(mapWorkout),
    },
    report,
  };
}

export function formatZodError(error: ZodError): string {
  const issues = error.issues.slice(0, MAX_REPORTED_ISSUES).map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  const more = error.issues.length - issues.length;
  return more > 0 ? `${issues.join('; ')} (and ${String(more)} more)` : issues.join('; ');
}

/**
 * Decode a raw upload body.
 *
 * @throws DecodeError when the body is not JSON or does not match the export shape
 */
export function decodeExport(body: string): DecodedExport {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(`invalid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const result = ExportPayloadSchema.safeParse(json);
  if (!result.success) {
    throw new DecodeError(formatZodError(result.error), { cause: result.error });
  }
  return mapPayload(result.data);
}

export function summarizeExport(data: Export): ExportSummary {
  return {
    ecg: data.ecg.length,
    metrics: data.metrics.length,
    populatedMetrics: data.metrics.filter((metric) => metric.samples.length > 0).length,
    samples: data.metrics.reduce((total, metric) => total + metric.samples.length, 0),
    stateOfMind: data.stateOfMind.length,
    workouts: data.workouts.length,
  };
}

/**
 * Response line for an accepted upload.
 */
export function formatSummary(summary: ExportSummary): string {
  return (
    `Processing request. Received ${String(summary.metrics)} metrics ` +
    `(${String(summary.populatedMetrics)} populated), ${String(summary.samples)} samples, ` +
    `${String(summary.workouts)} workouts, ${String(summary.stateOfMind)} state of mind entries ` +
    `and ${String(summary.ecg)} ECG recordings.`
  );
}
