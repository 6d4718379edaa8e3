/**
 * Workout type definitions.
 * Types for workout data structures from Apple Health.
 */

export interface Quantity {
  qty: number;
  units: string;
}

export interface GpsPoint {
  altitude: number;
  course: number;
  courseAccuracy: number;
  horizontalAccuracy: number;
  latitude: number;
  longitude: number;
  speed: number;
  speedAccuracy: number;
  verticalAccuracy: number;
  timestamp?: Date;
}

export interface HeartRateLog {
  avg: number;
  max: number;
  min: number;
  qty: number;
  source: string;
  units: string;
  date?: Date;
}

/** Step count, walking/running distance and active energy entries. */
export interface TimeseriesLog {
  qty: number;
  source: string;
  units: string;
  date?: Date;
}

export interface Workout {
  activeEnergy: TimeseriesLog[];
  duration: number;
  heartRateData: HeartRateLog[];
  heartRateRecovery: HeartRateLog[];
  location: string;
  name: string;
  route: GpsPoint[];
  stepCount: TimeseriesLog[];
  walkingAndRunningDistance: TimeseriesLog[];
  activeEnergyBurned?: Quantity;
  avgHeartRate?: Quantity;
  distance?: Quantity;
  elevationUp?: Quantity;
  end?: Date;
  humidity?: Quantity;
  id?: string;
  intensity?: Quantity;
  maxHeartRate?: Quantity;
  speed?: Quantity;
  start?: Date;
  stepCadence?: Quantity;
  temperature?: Quantity;
}
