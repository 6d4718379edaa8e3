/**
 * ECG recording from Apple Watch.
 * The export never carries an id; identity is derived from content on write.
 */

export interface VoltagePoint {
  units: string;
  voltage: number;
  /** When absent, derived from the recording start and sampling frequency. */
  date?: Date;
}

export interface Ecg {
  averageHeartRate: number;
  classification: string;
  numberOfVoltageMeasurements: number;
  samplingFrequency: number;
  source: string;
  voltageMeasurements: VoltagePoint[];
  end?: Date;
  start?: Date;
}
