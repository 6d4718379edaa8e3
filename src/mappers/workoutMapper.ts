/**
 * Workout data transformation utilities.
 * Splits each workout into its summary row and the rows of the six child tables.
 */

import { isUuid } from '../utils/deduplication';

import type {
  HeartRateLog,
  HeartRateRow,
  Quantity,
  SchemaLayout,
  TimeseriesLog,
  TimeseriesRow,
  Workout,
  WorkoutKey,
  WorkoutRow,
  WorkoutRowSet,
} from '../types';

/**
 * Workout identity for child rows. Under `uuid` the id must be a UUID;
 * under `legacy` children point at (name, start) and any id is kept as-is.
 * Returns a skip reason instead when the workout cannot be identified.
 */
function resolveKey(
  workout: Workout,
  start: Date,
  layout: SchemaLayout,
): { id: string; key: WorkoutKey } | { reason: string } {
  if (layout === 'legacy') {
    return { id: workout.id ?? '', key: { workout_name: workout.name, workout_start: start } };
  }
  if (!workout.id) return { reason: 'missing id' };
  if (!isUuid(workout.id)) return { reason: `id "${workout.id}" is not a UUID` };

  const id = workout.id.toLowerCase();
  return { id, key: { workout_id: id } };
}

function quantity(value: Quantity | undefined): [number, string] {
  return value ? [value.qty, value.units] : [0, ''];
}

function toWorkoutRow(workout: Workout, id: string, start: Date, end: Date): WorkoutRow {
  const [activeEnergyQty, activeEnergyUnits] = quantity(workout.activeEnergyBurned);
  const [avgHeartRateQty, avgHeartRateUnits] = quantity(workout.avgHeartRate);
  const [distanceQty, distanceUnits] = quantity(workout.distance);
  const [elevationUpQty, elevationUpUnits] = quantity(workout.elevationUp);
  const [humidityQty, humidityUnits] = quantity(workout.humidity);
  const [intensityQty, intensityUnits] = quantity(workout.intensity);
  const [maxHeartRateQty, maxHeartRateUnits] = quantity(workout.maxHeartRate);
  const [speedQty, speedUnits] = quantity(workout.speed);
  const [stepCadenceQty, stepCadenceUnits] = quantity(workout.stepCadence);
  const [temperatureQty, temperatureUnits] = quantity(workout.temperature);

  return {
    active_energy_qty: activeEnergyQty,
    active_energy_units: activeEnergyUnits,
    avg_heart_rate_qty: avgHeartRateQty,
    avg_heart_rate_units: avgHeartRateUnits,
    distance_qty: distanceQty,
    distance_units: distanceUnits,
    duration: workout.duration,
    elevation_up_qty: elevationUpQty,
    elevation_up_units: elevationUpUnits,
    end,
    humidity_qty: humidityQty,
    humidity_units: humidityUnits,
    id,
    intensity_qty: intensityQty,
    intensity_units: intensityUnits,
    location: workout.location,
    max_heart_rate_qty: maxHeartRateQty,
    max_heart_rate_units: maxHeartRateUnits,
    name: workout.name,
    speed_qty: speedQty,
    speed_units: speedUnits,
    start,
    step_cadence_qty: stepCadenceQty,
    step_cadence_units: stepCadenceUnits,
    temperature_qty: temperatureQty,
    temperature_units: temperatureUnits,
  };
}

function toHeartRateRows(logs: HeartRateLog[], key: WorkoutKey, start: Date): HeartRateRow[] {
  return logs.map((log) => ({
    ...key,
    avg: log.avg,
    max: log.max,
    min: log.min,
    qty: log.qty,
    source: log.source,
    timestamp: log.date ?? start,
    units: log.units,
  }));
}

function toTimeseriesRows(logs: TimeseriesLog[], key: WorkoutKey, start: Date): TimeseriesRow[] {
  return logs.map((log) => ({
    ...key,
    qty: log.qty,
    source: log.source,
    timestamp: log.date ?? start,
    units: log.units,
  }));
}

// Element-wise: spreading a long child list into push() overflows the call stack
function append<T>(target: T[], rows: T[]): void {
  for (const row of rows) target.push(row);
}

/**
 * Map workouts to rows. Workouts missing start or end, or an identity the
 * layout requires, are reported in `skipped` and produce no rows at all.
 * Children without their own timestamp inherit the workout start.
 */
export function toWorkoutRows(workouts: Workout[], layout: SchemaLayout): WorkoutRowSet {
  const result: WorkoutRowSet = {
    activeEnergy: [],
    heartRateData: [],
    heartRateRecovery: [],
    routes: [],
    skipped: [],
    stepCount: [],
    walkingRunningDistance: [],
    workouts: [],
  };

  for (const [index, workout] of workouts.entries()) {
    const { end, start } = workout;
    if (!start || !end) {
      result.skipped.push({
        category: 'workouts',
        index,
        reason: start ? 'missing end time' : 'missing start time',
      });
      continue;
    }

    const identity = resolveKey(workout, start, layout);
    if ('reason' in identity) {
      result.skipped.push({ category: 'workouts', index, reason: identity.reason });
      continue;
    }
    const { id, key } = identity;

    result.workouts.push(toWorkoutRow(workout, id, start, end));
    for (const point of workout.route) {
      result.routes.push({
        ...key,
        altitude: point.altitude,
        course: point.course,
        course_accuracy: point.courseAccuracy,
        horizontal_accuracy: point.horizontalAccuracy,
        lat: point.latitude,
        lon: point.longitude,
        speed: point.speed,
        speed_accuracy: point.speedAccuracy,
        timestamp: point.timestamp ?? start,
        vertical_accuracy: point.verticalAccuracy,
      });
    }
    append(result.heartRateData, toHeartRateRows(workout.heartRateData, key, start));
    append(result.heartRateRecovery, toHeartRateRows(workout.heartRateRecovery, key, start));
    append(result.stepCount, toTimeseriesRows(workout.stepCount, key, start));
    append(
      result.walkingRunningDistance,
      toTimeseriesRows(workout.walkingAndRunningDistance, key, start),
    );
    append(result.activeEnergy, toTimeseriesRows(workout.activeEnergy, key, start));
  }

  return result;
}
