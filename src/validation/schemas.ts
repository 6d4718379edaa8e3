import { z } from 'zod';

import { parseTimestamp, parseUnixSeconds } from './timestamp';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Absent and null both decode to the zero value so nothing null reaches the store
const numberOrZero = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);

const stringOrEmpty = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

// Sample fields keep "absent" distinct from zero: presence decides the sample shape
const presentNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

const presentString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const stringList = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? []);

const TimestampSchema = z
  .string()
  .nullish()
  .transform((value, ctx): Date | undefined => {
    if (!value) return undefined;
    const date = parseTimestamp(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unrecognized timestamp "${value}"` });
      return z.NEVER;
    }
    return date;
  });

// Voltage points carry Unix seconds as a float, older exports a timestamp string
const VoltageDateSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value, ctx): Date | undefined => {
    if (value === null || value === undefined || value === '') return undefined;
    const date = typeof value === 'number' ? parseUnixSeconds(value) : parseTimestamp(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unrecognized timestamp "${value}"` });
      return z.NEVER;
    }
    return date;
  });

/**
 * Some exporter versions wrap quantities in an array; the first element wins.
 */
function firstElement(value: unknown): unknown {
  return Array.isArray(value) && value.length > 0 ? value[0] : value;
}

/**
 * Heart rate entries have shipped both `Min`/`Max`/`Avg` and lowercase keys.
 */
function lowercaseStatKeys(value: unknown): unknown {
  if (!isRecord(value)) return value;
  const normalized: Record<string, unknown> = { ...value };
  for (const [from, to] of [
    ['Avg', 'avg'],
    ['Max', 'max'],
    ['Min', 'min'],
  ] as const) {
    if (normalized[to] === undefined && normalized[from] !== undefined) {
      normalized[to] = normalized[from];
    }
  }
  return normalized;
}

/**
 * Lists that arrive as a single object are treated as one-element lists.
 */
const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z
    .preprocess((value) => (isRecord(value) ? [value] : value), z.array(item).nullish())
    .transform((value) => value ?? []);

export const QuantitySchema = z.preprocess(
  firstElement,
  z.object({
    qty: numberOrZero,
    units: stringOrEmpty,
  }),
);

const OptionalQuantitySchema = QuantitySchema.nullish().transform((value) => value ?? undefined);

export const RawSampleSchema = z.preprocess(
  lowercaseStatKeys,
  z.object({
    asleep: presentNumber,
    avg: presentNumber,
    date: TimestampSchema,
    inBed: presentNumber,
    inBedSource: presentString,
    max: presentNumber,
    min: presentNumber,
    qty: presentNumber,
    sleepSource: presentString,
  }),
);

const MetricSchema = z.object({
  data: listOf(RawSampleSchema),
  name: z.string(),
  units: stringOrEmpty,
});

const GpsPointSchema = z.object({
  altitude: numberOrZero,
  course: numberOrZero,
  courseAccuracy: numberOrZero,
  horizontalAccuracy: numberOrZero,
  latitude: numberOrZero,
  longitude: numberOrZero,
  speed: numberOrZero,
  speedAccuracy: numberOrZero,
  timestamp: TimestampSchema,
  verticalAccuracy: numberOrZero,
});

const HeartRateLogSchema = z.preprocess(
  lowercaseStatKeys,
  z.object({
    avg: numberOrZero,
    date: TimestampSchema,
    max: numberOrZero,
    min: numberOrZero,
    qty: numberOrZero,
    source: stringOrEmpty,
    units: stringOrEmpty,
  }),
);

const TimeseriesLogSchema = z.object({
  date: TimestampSchema,
  qty: numberOrZero,
  source: stringOrEmpty,
  units: stringOrEmpty,
});

export const RawWorkoutSchema = z.object({
  activeEnergy: listOf(TimeseriesLogSchema),
  activeEnergyBurned: OptionalQuantitySchema,
  avgHeartRate: OptionalQuantitySchema,
  distance: OptionalQuantitySchema,
  duration: numberOrZero,
  elevationUp: OptionalQuantitySchema,
  end: TimestampSchema,
  heartRate: z
    .object({
      avg: OptionalQuantitySchema,
      max: OptionalQuantitySchema,
      min: OptionalQuantitySchema,
    })
    .nullish()
    .transform((value) => value ?? undefined),
  heartRateData: listOf(HeartRateLogSchema),
  heartRateRecovery: listOf(HeartRateLogSchema),
  humidity: OptionalQuantitySchema,
  id: presentString,
  intensity: OptionalQuantitySchema,
  location: stringOrEmpty,
  maxHeartRate: OptionalQuantitySchema,
  name: stringOrEmpty,
  route: listOf(GpsPointSchema),
  speed: OptionalQuantitySchema,
  start: TimestampSchema,
  stepCadence: OptionalQuantitySchema,
  stepCount: listOf(TimeseriesLogSchema),
  temperature: OptionalQuantitySchema,
  walkingAndRunningDistance: listOf(TimeseriesLogSchema),
});

const StateOfMindSchema = z.object({
  associations: stringList,
  end: TimestampSchema,
  id: presentString,
  kind: stringOrEmpty,
  labels: stringList,
  start: TimestampSchema,
  valence: numberOrZero,
  valenceClassification: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined ? '' : String(value))),
});

const VoltagePointSchema = z.object({
  date: VoltageDateSchema,
  units: stringOrEmpty,
  voltage: numberOrZero,
});

export const RawEcgSchema = z.object({
  averageHeartRate: numberOrZero,
  classification: stringOrEmpty,
  end: TimestampSchema,
  numberOfVoltageMeasurements: z
    .number()
    .int()
    .nonnegative()
    .nullish()
    .transform((value) => value ?? undefined),
  samplingFrequency: numberOrZero,
  source: stringOrEmpty,
  start: TimestampSchema,
  voltageMeasurements: listOf(VoltagePointSchema),
});

/**
 * Upload payload. Every category is optional and defaults to empty;
 * unknown fields are stripped.
 */
export const ExportPayloadSchema = z.object({
  data: z.object({
    ecg: listOf(RawEcgSchema),
    metrics: listOf(MetricSchema),
    stateOfMind: listOf(StateOfMindSchema),
    workouts: listOf(RawWorkoutSchema),
  }),
});

export type ExportPayload = z.infer<typeof ExportPayloadSchema>;
export type RawEcg = z.infer<typeof RawEcgSchema>;
export type RawMetric = z.infer<typeof MetricSchema>;
export type RawSample = z.infer<typeof RawSampleSchema>;
export type RawWorkout = z.infer<typeof RawWorkoutSchema>;
