/**
 * ECG transformation utilities.
 * One summary row per recording plus one row per voltage sample.
 */

import { createEcgId } from '../utils/deduplication';

import type { Ecg, EcgRowSet } from '../types';

/**
 * Timestamp of the sample at `index` when the export omits it:
 * `start + index / samplingFrequency` seconds, rounded to the millisecond.
 * Without a usable frequency every sample sits at `start`.
 */
export function voltageTimestamp(start: Date, samplingFrequency: number, index: number): Date {
  if (samplingFrequency <= 0) return new Date(start.getTime());
  return new Date(start.getTime() + Math.round((index * 1000) / samplingFrequency));
}

export function toEcgRows(entries: Ecg[]): EcgRowSet {
  const result: EcgRowSet = { ecg: [], skipped: [], voltages: [] };

  for (const [index, ecg] of entries.entries()) {
    const { end, start } = ecg;
    if (!start || !end) {
      result.skipped.push({
        category: 'ecg',
        index,
        reason: start ? 'missing end time' : 'missing start time',
      });
      continue;
    }

    const id = createEcgId(ecg, start);
    result.ecg.push({
      average_heart_rate: ecg.averageHeartRate,
      classification: ecg.classification,
      end,
      id,
      number_of_voltage_measurements: ecg.numberOfVoltageMeasurements,
      sampling_frequency: ecg.samplingFrequency,
      source: ecg.source,
      start,
    });

    for (const [sampleIndex, point] of ecg.voltageMeasurements.entries()) {
      result.voltages.push({
        ecg_id: id,
        sample_index: sampleIndex,
        timestamp: point.date ?? voltageTimestamp(start, ecg.samplingFrequency, sampleIndex),
        units: point.units,
        voltage: point.voltage,
      });
    }
  }

  return result;
}
